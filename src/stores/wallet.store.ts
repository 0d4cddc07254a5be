import mongoose, { FilterQuery } from 'mongoose';

import { ApiError } from '../middlewares/errorHandler';
import { IWallet, IWalletLedgerEntry, Wallet, WalletLedgerEntry } from '../models';
import { LedgerEntryType } from '../types/events';
import { LedgerEntryRecord, Page, PageResult, WalletRecord } from '../types/records';
import { addMoney, roundMoney, subtractMoney, toMinorUnits } from '../utils/money';

export interface CreateWalletInput {
  customerId: string;
  currency: string;
}

export interface ApplyTransactionInput {
  walletId: string;
  amount: number;
  type: LedgerEntryType;
  description: string;
  referenceId?: string | null;
}

export type ApplyTransactionResult =
  | { ok: true; wallet: WalletRecord; entry: LedgerEntryRecord }
  | { ok: false; reason: 'INSUFFICIENT_FUNDS'; balance: number }
  | { ok: false; reason: 'WALLET_NOT_FOUND' };

/**
 * Ledgered wallet persistence.
 *
 * `applyTransaction` is the only way a balance changes: the balance update and
 * its ledger entry are written together, and a debit never takes the balance
 * below zero. Amounts under one cent are rejected.
 */
export interface WalletStore {
  create(input: CreateWalletInput): Promise<WalletRecord>;
  findById(walletId: string): Promise<WalletRecord | null>;
  findByCustomerId(customerId: string): Promise<WalletRecord | null>;
  list(page: Page): Promise<PageResult<WalletRecord>>;
  applyTransaction(input: ApplyTransactionInput): Promise<ApplyTransactionResult>;
  listEntries(walletId: string, page: Page): Promise<PageResult<LedgerEntryRecord>>;
  sumEntries(walletId: string): Promise<number>;
}

export const toWalletRecord = (doc: IWallet): WalletRecord => ({
  walletId: doc.walletId,
  customerId: doc.customerId,
  balance: doc.balance,
  currency: doc.currency,
  isActive: doc.isActive,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export const toLedgerEntryRecord = (doc: IWalletLedgerEntry): LedgerEntryRecord => ({
  entryId: doc.entryId,
  walletId: doc.walletId,
  type: doc.type,
  amount: doc.amount,
  description: doc.description,
  referenceId: doc.referenceId ?? null,
  balanceBefore: doc.balanceBefore,
  balanceAfter: doc.balanceAfter,
  createdAt: doc.createdAt,
});

const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 11000;

/**
 * MongoDB wallet store. Requires a replica set: ledger writes run inside a
 * multi-document transaction.
 */
export class MongoWalletStore implements WalletStore {
  async create(input: CreateWalletInput): Promise<WalletRecord> {
    try {
      const wallet = await Wallet.create({
        customerId: input.customerId,
        currency: input.currency,
        balance: 0,
      });
      return toWalletRecord(wallet);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw ApiError.alreadyExists('Wallet');
      }
      throw error;
    }
  }

  async findById(walletId: string): Promise<WalletRecord | null> {
    const wallet = await Wallet.findOne({ walletId });
    return wallet ? toWalletRecord(wallet) : null;
  }

  async findByCustomerId(customerId: string): Promise<WalletRecord | null> {
    const wallet = await Wallet.findOne({ customerId });
    return wallet ? toWalletRecord(wallet) : null;
  }

  async list(page: Page): Promise<PageResult<WalletRecord>> {
    const filter: FilterQuery<IWallet> = {};
    const [wallets, total] = await Promise.all([
      Wallet.find(filter).sort({ createdAt: -1 }).skip(page.offset).limit(page.limit),
      Wallet.countDocuments(filter),
    ]);
    return { items: wallets.map(toWalletRecord), total, ...page };
  }

  async applyTransaction(input: ApplyTransactionInput): Promise<ApplyTransactionResult> {
    if (!(toMinorUnits(input.amount) > 0)) {
      throw ApiError.invalidAmount('Transaction amount must be at least one cent');
    }

    const session = await mongoose.startSession();
    const outcome: { result?: ApplyTransactionResult } = {};

    try {
      await session.withTransaction(async () => {
        const wallet = await Wallet.findOne({ walletId: input.walletId }).session(session);
        if (!wallet) {
          outcome.result = { ok: false, reason: 'WALLET_NOT_FOUND' };
          return;
        }

        const balanceBefore = wallet.balance;
        if (
          input.type === LedgerEntryType.DEBIT &&
          toMinorUnits(balanceBefore) < toMinorUnits(input.amount)
        ) {
          outcome.result = { ok: false, reason: 'INSUFFICIENT_FUNDS', balance: balanceBefore };
          return;
        }

        const balanceAfter =
          input.type === LedgerEntryType.CREDIT
            ? addMoney(balanceBefore, input.amount)
            : subtractMoney(balanceBefore, input.amount);

        // Compare-and-set on the balance that was read
        const updated = await Wallet.findOneAndUpdate(
          { walletId: input.walletId, balance: balanceBefore },
          { $set: { balance: balanceAfter } },
          { new: true, session }
        );
        if (!updated) {
          throw ApiError.concurrentModification(`Wallet ${input.walletId} changed during update`);
        }

        const [entry] = await WalletLedgerEntry.create(
          [
            {
              walletId: input.walletId,
              type: input.type,
              amount: roundMoney(input.amount),
              description: input.description,
              referenceId: input.referenceId ?? undefined,
              balanceBefore,
              balanceAfter,
            },
          ],
          { session }
        );

        outcome.result = {
          ok: true,
          wallet: toWalletRecord(updated),
          entry: toLedgerEntryRecord(entry),
        };
      });
    } finally {
      await session.endSession();
    }

    if (!outcome.result) {
      throw ApiError.database('Wallet transaction did not complete');
    }
    return outcome.result;
  }

  async listEntries(walletId: string, page: Page): Promise<PageResult<LedgerEntryRecord>> {
    const [entries, total] = await Promise.all([
      WalletLedgerEntry.find({ walletId })
        .sort({ createdAt: -1 })
        .skip(page.offset)
        .limit(page.limit),
      WalletLedgerEntry.countDocuments({ walletId }),
    ]);
    return { items: entries.map(toLedgerEntryRecord), total, ...page };
  }

  async sumEntries(walletId: string): Promise<number> {
    const [row] = await WalletLedgerEntry.aggregate<{ total: number }>([
      { $match: { walletId } },
      {
        $group: {
          _id: null,
          total: {
            $sum: {
              $cond: [
                { $eq: ['$type', LedgerEntryType.CREDIT] },
                '$amount',
                { $multiply: ['$amount', -1] },
              ],
            },
          },
        },
      },
    ]);
    return row ? roundMoney(row.total) : 0;
  }
}
