import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger, Logger, walletOperationsTotal } from '../../observability';
import { WalletStore } from '../../stores/wallet.store';
import { LedgerEntryType } from '../../types/events';
import { LedgerEntryRecord, Page, PageResult, WalletRecord } from '../../types/records';
import { roundMoney, toMinorUnits } from '../../utils/money';

export interface CreditResult {
  wallet: WalletRecord;
  entry: LedgerEntryRecord;
}

export interface ReconciliationReport {
  walletId: string;
  customerId: string;
  balance: number;
  ledgerSum: number;
  consistent: boolean;
}

export class WalletService {
  constructor(
    private readonly store: WalletStore,
    private readonly log: Logger = createServiceLogger('wallet-service')
  ) {}

  /**
   * Open a wallet for a customer. One wallet per customer.
   */
  async createWallet(customerId: string, currency = 'USD'): Promise<WalletRecord> {
    const existing = await this.store.findByCustomerId(customerId);
    if (existing) {
      throw ApiError.alreadyExists('Wallet');
    }

    const wallet = await this.store.create({ customerId, currency: currency.toUpperCase() });
    this.log.info({ walletId: wallet.walletId, customerId }, 'Wallet created');
    return wallet;
  }

  /**
   * Get wallet by customerId
   */
  async getWallet(customerId: string): Promise<WalletRecord> {
    const wallet = await this.store.findByCustomerId(customerId);
    if (!wallet) {
      throw ApiError.notFound('Wallet');
    }
    return wallet;
  }

  async listWallets(page: Page): Promise<PageResult<WalletRecord>> {
    return this.store.list(page);
  }

  /**
   * Top up a wallet through the ledger
   */
  async credit(
    customerId: string,
    amount: number,
    description = 'Wallet top-up',
    referenceId?: string
  ): Promise<CreditResult> {
    if (!(toMinorUnits(amount) > 0)) {
      throw ApiError.invalidAmount('Credit amount must be positive');
    }

    const wallet = await this.getWallet(customerId);
    if (!wallet.isActive) {
      throw ApiError.walletInactive();
    }

    const result = await this.store.applyTransaction({
      walletId: wallet.walletId,
      amount: roundMoney(amount),
      type: LedgerEntryType.CREDIT,
      description,
      referenceId: referenceId ?? null,
    });

    if (!result.ok) {
      walletOperationsTotal.inc({ operation: LedgerEntryType.CREDIT, result: 'not_found' });
      throw ApiError.notFound('Wallet');
    }

    walletOperationsTotal.inc({ operation: LedgerEntryType.CREDIT, result: 'applied' });
    this.log.info(
      { walletId: wallet.walletId, amount: result.entry.amount, balance: result.wallet.balance },
      'Wallet credited'
    );
    return { wallet: result.wallet, entry: result.entry };
  }

  /**
   * Ledger entries, newest first
   */
  async getLedger(customerId: string, page: Page): Promise<PageResult<LedgerEntryRecord>> {
    const wallet = await this.getWallet(customerId);
    return this.store.listEntries(wallet.walletId, page);
  }

  /**
   * Compare the stored balance with the net sum of the ledger
   */
  async reconcile(customerId: string): Promise<ReconciliationReport> {
    const wallet = await this.getWallet(customerId);
    const ledgerSum = await this.store.sumEntries(wallet.walletId);
    const consistent = toMinorUnits(ledgerSum) === toMinorUnits(wallet.balance);

    if (!consistent) {
      this.log.error(
        { walletId: wallet.walletId, balance: wallet.balance, ledgerSum },
        'Wallet balance does not match its ledger'
      );
    }

    return {
      walletId: wallet.walletId,
      customerId: wallet.customerId,
      balance: wallet.balance,
      ledgerSum,
      consistent,
    };
  }
}
