import mongoose, { Document, Schema } from 'mongoose';

import { LedgerEntryType } from '../types/events';
import { generateId } from '../utils/ids';

/**
 * Append-only balance history. Entries are never updated or deleted.
 */
export interface IWalletLedgerEntry extends Document {
  entryId: string;
  walletId: string;
  type: LedgerEntryType;
  amount: number;
  description: string;
  referenceId?: string;
  balanceBefore: number;
  balanceAfter: number;
  createdAt: Date;
}

const walletLedgerEntrySchema = new Schema<IWalletLedgerEntry>(
  {
    entryId: {
      type: String,
      required: true,
      unique: true,
      index: true,
      default: () => generateId('led'),
    },
    walletId: {
      type: String,
      required: true,
      index: true,
    },
    type: {
      type: String,
      required: true,
      enum: Object.values(LedgerEntryType),
    },
    amount: {
      type: Number,
      required: true,
      min: 0.01,
    },
    description: {
      type: String,
      required: true,
      trim: true,
    },
    referenceId: {
      type: String,
      index: true,
    },
    balanceBefore: {
      type: Number,
      required: true,
    },
    balanceAfter: {
      type: Number,
      required: true,
      min: 0,
    },
  },
  {
    timestamps: { createdAt: true, updatedAt: false },
  }
);

// Balance history, newest first
walletLedgerEntrySchema.index({ walletId: 1, createdAt: -1 });

export const WalletLedgerEntry = mongoose.model<IWalletLedgerEntry>(
  'WalletLedgerEntry',
  walletLedgerEntrySchema
);
