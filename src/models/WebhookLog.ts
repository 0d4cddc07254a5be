import mongoose, { Document, Schema } from 'mongoose';

import { WebhookEventType, WebhookLogStatus } from '../types/events';
import { generateId } from '../utils/ids';

/**
 * One row per dispatch, holding the payload snapshot and the aggregate outcome
 */
export interface IWebhookLog extends Document {
  logId: string;
  eventType: WebhookEventType;
  payload: Record<string, unknown>;
  status: WebhookLogStatus;
  processedAt?: Date;
  errorMessage?: string;
  createdAt: Date;
  updatedAt: Date;
}

const webhookLogSchema = new Schema<IWebhookLog>(
  {
    logId: {
      type: String,
      required: true,
      unique: true,
      index: true,
      default: () => generateId('whl'),
    },
    eventType: {
      type: String,
      required: true,
      enum: Object.values(WebhookEventType),
    },
    payload: {
      type: Schema.Types.Mixed,
      required: true,
    },
    status: {
      type: String,
      required: true,
      enum: Object.values(WebhookLogStatus),
      default: WebhookLogStatus.PENDING,
    },
    processedAt: {
      type: Date,
    },
    errorMessage: {
      type: String,
    },
  },
  {
    timestamps: true,
  }
);

webhookLogSchema.index({ status: 1, createdAt: -1 });
webhookLogSchema.index({ 'payload.charge_id': 1 });

export const WebhookLog = mongoose.model<IWebhookLog>('WebhookLog', webhookLogSchema);
