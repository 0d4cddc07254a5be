import mongoose, { Document, Schema } from 'mongoose';

import { InstallmentStatus } from '../types/events';
import { generateId } from '../utils/ids';

export interface IInstallment extends Document {
  installmentId: string;
  orderId: string;
  sequenceNumber: number;
  amount: number;
  dueDate: Date;
  status: InstallmentStatus;
  chargeId?: string;
  createdAt: Date;
  updatedAt: Date;
}

const installmentSchema = new Schema<IInstallment>(
  {
    installmentId: {
      type: String,
      required: true,
      unique: true,
      index: true,
      default: () => generateId('ins'),
    },
    orderId: {
      type: String,
      required: true,
      index: true,
    },
    sequenceNumber: {
      type: Number,
      required: true,
      min: 1,
    },
    amount: {
      type: Number,
      required: true,
      min: 0.01,
    },
    dueDate: {
      type: Date,
      required: true,
    },
    status: {
      type: String,
      required: true,
      enum: Object.values(InstallmentStatus),
      default: InstallmentStatus.PENDING,
    },
    chargeId: {
      type: String,
    },
  },
  {
    timestamps: true,
  }
);

installmentSchema.index({ orderId: 1, sequenceNumber: 1 }, { unique: true });

// Due-installment sweep
installmentSchema.index({ status: 1, dueDate: 1 });

export const Installment = mongoose.model<IInstallment>('Installment', installmentSchema);
