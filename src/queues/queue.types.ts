import { WebhookEventType } from '../types/events';

/**
 * Job payloads carry ids only; workers reload current state.
 */
export interface SettleChargeJobData {
  chargeId: string;
}

export interface SettleChargeJobResult {
  outcome: 'succeeded' | 'failed' | 'skipped' | 'error';
}

export interface WebhookJobData {
  eventType: WebhookEventType;
  chargeId: string;
}

export interface WebhookJobResult {
  logId: string;
  status: string;
}

export interface SchedulerJobData {
  source: 'repeat' | 'manual';
}

export interface SchedulerJobResult {
  processedCount: number;
  skippedCount: number;
  failureCount: number;
}

/**
 * Seams the services depend on instead of BullMQ itself
 */
export interface SettlementQueue {
  enqueueSettlement(chargeId: string): Promise<void>;
}

export interface NotificationQueue {
  enqueueWebhook(eventType: WebhookEventType, chargeId: string): Promise<void>;
}
