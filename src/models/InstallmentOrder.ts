import mongoose, { Document, Schema } from 'mongoose';

import { OrderStatus } from '../types/events';
import { generateId } from '../utils/ids';

export interface IInstallmentOrder extends Document {
  orderId: string;
  customerId: string;
  totalAmount: number;
  currency: string;
  installmentCount: number;
  installmentAmount: number;
  status: OrderStatus;
  createdAt: Date;
  updatedAt: Date;
}

const installmentOrderSchema = new Schema<IInstallmentOrder>(
  {
    orderId: {
      type: String,
      required: true,
      unique: true,
      index: true,
      default: () => generateId('ord'),
    },
    customerId: {
      type: String,
      required: true,
      index: true,
    },
    totalAmount: {
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
    installmentCount: {
      type: Number,
      required: true,
      min: 1,
      max: 24,
    },
    installmentAmount: {
      type: Number,
      required: true,
    },
    status: {
      type: String,
      required: true,
      enum: Object.values(OrderStatus),
      default: OrderStatus.PENDING,
      index: true,
    },
  },
  {
    timestamps: true,
  }
);

export const InstallmentOrder = mongoose.model<IInstallmentOrder>(
  'InstallmentOrder',
  installmentOrderSchema
);
