import { WalletService } from '../../../src/services/wallet';
import { ErrorCode } from '../../../src/types/errors';
import { LedgerEntryType } from '../../../src/types/events';
import { InMemoryWalletStore } from '../../helpers';

describe('WalletService', () => {
  let store: InMemoryWalletStore;
  let service: WalletService;

  beforeEach(() => {
    store = new InMemoryWalletStore();
    service = new WalletService(store);
  });

  describe('createWallet', () => {
    it('opens an empty active wallet', async () => {
      const wallet = await service.createWallet('cust_1', 'eur');

      expect(wallet.walletId).toMatch(/^wal_/);
      expect(wallet.customerId).toBe('cust_1');
      expect(wallet.balance).toBe(0);
      expect(wallet.currency).toBe('EUR');
      expect(wallet.isActive).toBe(true);
    });

    it('defaults to USD', async () => {
      const wallet = await service.createWallet('cust_1');
      expect(wallet.currency).toBe('USD');
    });

    it('rejects a second wallet for the same customer', async () => {
      await service.createWallet('cust_1');
      await expect(service.createWallet('cust_1')).rejects.toMatchObject({
        errorCode: ErrorCode.WALLET_ALREADY_EXISTS,
        statusCode: 409,
      });
    });
  });

  describe('credit', () => {
    it('adds to the balance and writes a ledger entry', async () => {
      await service.createWallet('cust_1');

      const { wallet, entry } = await service.credit('cust_1', 40, 'Top-up', 'ref_1');

      expect(wallet.balance).toBe(40);
      expect(entry).toMatchObject({
        type: LedgerEntryType.CREDIT,
        amount: 40,
        description: 'Top-up',
        referenceId: 'ref_1',
        balanceBefore: 0,
        balanceAfter: 40,
      });
    });

    it('rounds to cents', async () => {
      await service.createWallet('cust_1');
      const { wallet } = await service.credit('cust_1', 10.004);
      expect(wallet.balance).toBe(10);
    });

    it('rejects a non-positive amount', async () => {
      await service.createWallet('cust_1');
      await expect(service.credit('cust_1', 0)).rejects.toMatchObject({
        errorCode: ErrorCode.INVALID_AMOUNT,
      });
    });

    it('rejects an unknown customer', async () => {
      await expect(service.credit('cust_missing', 10)).rejects.toMatchObject({
        errorCode: ErrorCode.WALLET_NOT_FOUND,
        statusCode: 404,
      });
    });

    it('rejects an inactive wallet', async () => {
      const wallet = await service.createWallet('cust_1');
      store.patch(wallet.walletId, { isActive: false });

      await expect(service.credit('cust_1', 10)).rejects.toMatchObject({
        errorCode: ErrorCode.WALLET_INACTIVE,
      });
      expect(store.entries).toHaveLength(0);
    });
  });

  describe('getLedger', () => {
    it('returns entries newest first', async () => {
      await service.createWallet('cust_1');
      await service.credit('cust_1', 10);
      await service.credit('cust_1', 20);

      const ledger = await service.getLedger('cust_1', { limit: 20, offset: 0 });

      expect(ledger.total).toBe(2);
      expect(ledger.items.map((entry) => entry.amount)).toEqual([20, 10]);
    });
  });

  describe('reconcile', () => {
    it('reports a consistent wallet', async () => {
      const wallet = await service.createWallet('cust_1');
      await service.credit('cust_1', 25.5);

      await expect(service.reconcile('cust_1')).resolves.toEqual({
        walletId: wallet.walletId,
        customerId: 'cust_1',
        balance: 25.5,
        ledgerSum: 25.5,
        consistent: true,
      });
    });

    it('flags a balance changed outside the ledger', async () => {
      const wallet = await service.createWallet('cust_1');
      await service.credit('cust_1', 10);
      store.patch(wallet.walletId, { balance: 15 });

      const report = await service.reconcile('cust_1');

      expect(report.consistent).toBe(false);
      expect(report.ledgerSum).toBe(10);
      expect(report.balance).toBe(15);
    });
  });
});
