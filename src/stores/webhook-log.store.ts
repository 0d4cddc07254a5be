import { FilterQuery } from 'mongoose';

import {
  IWebhookDelivery,
  IWebhookLog,
  RESPONSE_BODY_LIMIT,
  WebhookDelivery,
  WebhookLog,
} from '../models';
import { DeliveryStatus, WebhookEventType, WebhookLogStatus } from '../types/events';
import { Page, PageResult, WebhookDeliveryRecord, WebhookLogRecord } from '../types/records';

export interface NewWebhookLog {
  eventType: WebhookEventType;
  payload: Record<string, unknown>;
}

export interface WebhookLogOutcome {
  status: WebhookLogStatus.PROCESSED | WebhookLogStatus.FAILED;
  processedAt?: Date;
  errorMessage?: string;
}

export interface NewWebhookDelivery {
  logId: string;
  url: string;
  status: DeliveryStatus;
  responseCode?: number;
  responseBody?: string;
  error?: string;
  durationMs: number;
}

export interface WebhookLogFilter {
  status?: WebhookLogStatus;
  eventType?: WebhookEventType;
  chargeId?: string;
}

export interface WebhookLogStore {
  create(input: NewWebhookLog): Promise<WebhookLogRecord>;
  markOutcome(logId: string, outcome: WebhookLogOutcome): Promise<WebhookLogRecord | null>;
  recordDelivery(input: NewWebhookDelivery): Promise<WebhookDeliveryRecord>;
  findById(logId: string): Promise<WebhookLogRecord | null>;
  list(filter: WebhookLogFilter, page: Page): Promise<PageResult<WebhookLogRecord>>;
  listDeliveries(logId: string): Promise<WebhookDeliveryRecord[]>;
}

export const truncateResponseBody = (body: string): string =>
  body.length > RESPONSE_BODY_LIMIT ? body.slice(0, RESPONSE_BODY_LIMIT) : body;

export const toWebhookLogRecord = (doc: IWebhookLog): WebhookLogRecord => ({
  logId: doc.logId,
  eventType: doc.eventType,
  payload: doc.payload,
  status: doc.status,
  processedAt: doc.processedAt ?? null,
  errorMessage: doc.errorMessage ?? null,
  createdAt: doc.createdAt,
});

export const toWebhookDeliveryRecord = (doc: IWebhookDelivery): WebhookDeliveryRecord => ({
  deliveryId: doc.deliveryId,
  logId: doc.logId,
  url: doc.url,
  status: doc.status,
  responseCode: doc.responseCode ?? null,
  responseBody: doc.responseBody ?? null,
  error: doc.error ?? null,
  durationMs: doc.durationMs,
  createdAt: doc.createdAt,
});

export class MongoWebhookLogStore implements WebhookLogStore {
  async create(input: NewWebhookLog): Promise<WebhookLogRecord> {
    const log = await WebhookLog.create({
      eventType: input.eventType,
      payload: input.payload,
      status: WebhookLogStatus.PENDING,
    });
    return toWebhookLogRecord(log);
  }

  async markOutcome(logId: string, outcome: WebhookLogOutcome): Promise<WebhookLogRecord | null> {
    const set: Record<string, unknown> = { status: outcome.status };
    if (outcome.processedAt) set.processedAt = outcome.processedAt;
    if (outcome.errorMessage !== undefined) set.errorMessage = outcome.errorMessage;

    const log = await WebhookLog.findOneAndUpdate({ logId }, { $set: set }, { new: true });
    return log ? toWebhookLogRecord(log) : null;
  }

  async recordDelivery(input: NewWebhookDelivery): Promise<WebhookDeliveryRecord> {
    const delivery = await WebhookDelivery.create({
      ...input,
      responseBody:
        input.responseBody !== undefined ? truncateResponseBody(input.responseBody) : undefined,
    });
    return toWebhookDeliveryRecord(delivery);
  }

  async findById(logId: string): Promise<WebhookLogRecord | null> {
    const log = await WebhookLog.findOne({ logId });
    return log ? toWebhookLogRecord(log) : null;
  }

  async list(filter: WebhookLogFilter, page: Page): Promise<PageResult<WebhookLogRecord>> {
    const query: FilterQuery<IWebhookLog> = {};
    if (filter.status) query.status = filter.status;
    if (filter.eventType) query.eventType = filter.eventType;
    if (filter.chargeId) query['payload.charge_id'] = filter.chargeId;

    const [logs, total] = await Promise.all([
      WebhookLog.find(query).sort({ createdAt: -1 }).skip(page.offset).limit(page.limit),
      WebhookLog.countDocuments(query),
    ]);
    return { items: logs.map(toWebhookLogRecord), total, ...page };
  }

  async listDeliveries(logId: string): Promise<WebhookDeliveryRecord[]> {
    const deliveries = await WebhookDelivery.find({ logId }).sort({ createdAt: 1 });
    return deliveries.map(toWebhookDeliveryRecord);
  }
}
