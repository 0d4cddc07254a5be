import mongoose, { Document, Schema } from 'mongoose';

import { ChargeStatus, PaymentMethod } from '../types/events';
import { generateId } from '../utils/ids';

export interface ICharge extends Document {
  chargeId: string;
  customerId: string;
  amount: number;
  currency: string;
  status: ChargeStatus;
  paymentMethod?: PaymentMethod;
  externalChargeId?: string;
  walletAmount: number;
  installmentId?: string;
  orderId?: string;
  splitInstructions?: Record<string, unknown>;
  failureReason?: string;
  createdAt: Date;
  updatedAt: Date;
}

const chargeSchema = new Schema<ICharge>(
  {
    chargeId: {
      type: String,
      required: true,
      unique: true,
      index: true,
      default: () => generateId('chg'),
    },
    customerId: {
      type: String,
      required: true,
      index: true,
    },
    amount: {
      type: Number,
      required: true,
      min: 0.01,
    },
    currency: {
      type: String,
      required: true,
      default: 'USD',
      uppercase: true,
    },
    status: {
      type: String,
      required: true,
      enum: Object.values(ChargeStatus),
      default: ChargeStatus.PENDING,
      index: true,
    },
    paymentMethod: {
      type: String,
      enum: Object.values(PaymentMethod),
    },
    externalChargeId: {
      type: String,
    },
    walletAmount: {
      type: Number,
      default: 0,
      min: 0,
    },
    installmentId: {
      type: String,
      index: true,
    },
    orderId: {
      type: String,
      index: true,
    },
    splitInstructions: {
      type: Schema.Types.Mixed,
    },
    failureReason: {
      type: String,
    },
  },
  {
    timestamps: true,
  }
);

chargeSchema.index({ customerId: 1, createdAt: -1 });

export const Charge = mongoose.model<ICharge>('Charge', chargeSchema);
