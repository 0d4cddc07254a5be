/**
 * Webhook Service
 *
 * Builds charge notifications, records one log per dispatch with a delivery
 * row per destination, and answers log queries.
 */

import { ApiError } from '../../middlewares/errorHandler';
import {
  createServiceLogger,
  Logger,
  traceWebhook,
  webhookDeliveriesTotal,
  webhookDeliveryDuration,
} from '../../observability';
import { ChargeStore } from '../../stores/charge.store';
import { WebhookLogFilter, WebhookLogStore } from '../../stores/webhook-log.store';
import {
  ChargeWebhookPayload,
  DeliveryStatus,
  WebhookEventType,
  WebhookLogStatus,
} from '../../types/events';
import {
  ChargeRecord,
  Page,
  PageResult,
  WebhookDeliveryRecord,
  WebhookLogRecord,
} from '../../types/records';

import { WebhookTransport } from './webhook.transport';

export interface WebhookServiceDependencies {
  charges: ChargeStore;
  logs: WebhookLogStore;
  transport: WebhookTransport;
  /** Destination URLs, already split and trimmed */
  urls: string[];
  logger?: Logger;
}

export interface DispatchResult {
  logId: string;
  status: WebhookLogStatus;
  errorMessage: string | null;
  deliveries: WebhookDeliveryRecord[];
}

export interface WebhookLogDetail {
  log: WebhookLogRecord;
  deliveries: WebhookDeliveryRecord[];
}

/**
 * Fixed-shape notification for a charge
 */
export function buildChargeWebhookPayload(
  eventType: WebhookEventType,
  charge: ChargeRecord
): ChargeWebhookPayload {
  return {
    event_type: eventType,
    charge_id: charge.chargeId,
    customer_id: charge.customerId,
    amount: charge.amount,
    currency: charge.currency,
    status: charge.status,
    payment_method: charge.paymentMethod,
    external_charge_id: charge.externalChargeId,
    split_instructions: charge.splitInstructions,
    created_at: charge.createdAt.toISOString(),
    metadata: {
      installment_id: charge.installmentId,
      installment_order_id: charge.orderId,
    },
  };
}

export class WebhookService {
  private readonly charges: ChargeStore;
  private readonly logs: WebhookLogStore;
  private readonly transport: WebhookTransport;
  private readonly urls: string[];
  private readonly log: Logger;

  constructor(deps: WebhookServiceDependencies) {
    this.charges = deps.charges;
    this.logs = deps.logs;
    this.transport = deps.transport;
    this.urls = deps.urls;
    this.log = deps.logger ?? createServiceLogger('webhook-service');
  }

  /**
   * Deliver a charge notification to every configured destination.
   * Delivery failures are recorded on the log, never thrown.
   */
  async dispatch(eventType: WebhookEventType, chargeId: string): Promise<DispatchResult> {
    const charge = await this.charges.findById(chargeId);
    if (!charge) {
      throw ApiError.notFound('Charge');
    }

    const payload = buildChargeWebhookPayload(eventType, charge);
    const webhookLog = await this.logs.create({ eventType, payload });
    const log = this.log.child({ logId: webhookLog.logId, chargeId, eventType });

    if (this.urls.length === 0) {
      log.warn('No webhook destinations configured, log left pending');
      return {
        logId: webhookLog.logId,
        status: WebhookLogStatus.PENDING,
        errorMessage: null,
        deliveries: [],
      };
    }

    const deliveries: WebhookDeliveryRecord[] = [];
    const failures: string[] = [];

    // Destinations are attempted one after another
    for (const url of this.urls) {
      const attempt = await traceWebhook(webhookLog.logId, url, () =>
        this.transport.post(url, payload, { logId: webhookLog.logId, eventType })
      );

      const status = attempt.delivered ? DeliveryStatus.SUCCESS : DeliveryStatus.FAILED;
      webhookDeliveriesTotal.inc({ status: attempt.delivered ? 'success' : 'failure' });
      webhookDeliveryDuration.observe(
        { status: attempt.delivered ? 'success' : 'failure' },
        attempt.durationMs / 1000
      );

      deliveries.push(
        await this.logs.recordDelivery({
          logId: webhookLog.logId,
          url,
          status,
          responseCode: attempt.statusCode ?? undefined,
          responseBody: attempt.responseBody ?? undefined,
          error: attempt.error ?? undefined,
          durationMs: attempt.durationMs,
        })
      );

      if (attempt.delivered) {
        log.info({ url, statusCode: attempt.statusCode }, 'Webhook delivered');
      } else {
        failures.push(`${url}: ${attempt.error ?? 'unknown error'}`);
        log.warn({ url, statusCode: attempt.statusCode, error: attempt.error }, 'Webhook delivery failed');
      }
    }

    const errorMessage = failures.length > 0 ? failures.join('; ') : null;
    const updated = await this.logs.markOutcome(
      webhookLog.logId,
      errorMessage
        ? { status: WebhookLogStatus.FAILED, errorMessage }
        : { status: WebhookLogStatus.PROCESSED, processedAt: new Date() }
    );

    return {
      logId: webhookLog.logId,
      status: updated?.status ?? (errorMessage ? WebhookLogStatus.FAILED : WebhookLogStatus.PROCESSED),
      errorMessage,
      deliveries,
    };
  }

  async listLogs(filter: WebhookLogFilter, page: Page): Promise<PageResult<WebhookLogRecord>> {
    return this.logs.list(filter, page);
  }

  /**
   * Log with its per-destination deliveries
   */
  async getLog(logId: string): Promise<WebhookLogDetail> {
    const webhookLog = await this.logs.findById(logId);
    if (!webhookLog) {
      throw ApiError.notFound('Webhook log');
    }
    const deliveries = await this.logs.listDeliveries(logId);
    return { log: webhookLog, deliveries };
  }
}
