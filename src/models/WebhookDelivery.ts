import mongoose, { Document, Schema } from 'mongoose';

import { DeliveryStatus } from '../types/events';
import { generateId } from '../utils/ids';

export const RESPONSE_BODY_LIMIT = 1000;

export interface IWebhookDelivery extends Document {
  deliveryId: string;
  logId: string;
  url: string;
  status: DeliveryStatus;
  responseCode?: number;
  responseBody?: string;
  error?: string;
  durationMs: number;
  createdAt: Date;
}

const webhookDeliverySchema = new Schema<IWebhookDelivery>(
  {
    deliveryId: {
      type: String,
      required: true,
      unique: true,
      index: true,
      default: () => generateId('dlv'),
    },
    logId: {
      type: String,
      required: true,
      index: true,
    },
    url: {
      type: String,
      required: true,
    },
    status: {
      type: String,
      required: true,
      enum: Object.values(DeliveryStatus),
    },
    responseCode: {
      type: Number,
    },
    responseBody: {
      type: String,
      maxlength: RESPONSE_BODY_LIMIT,
    },
    error: {
      type: String,
    },
    durationMs: {
      type: Number,
      required: true,
      default: 0,
    },
  },
  {
    timestamps: { createdAt: true, updatedAt: false },
  }
);

// Delivery history per log
webhookDeliverySchema.index({ logId: 1, createdAt: 1 });

export const WebhookDelivery = mongoose.model<IWebhookDelivery>(
  'WebhookDelivery',
  webhookDeliverySchema
);
