/**
 * Webhook Controller
 *
 * Read-only access to dispatch logs.
 */

import { Request, Response, NextFunction } from 'express';

import { WebhookLogFilter } from '../../stores/webhook-log.store';
import { WebhookEventType, WebhookLogStatus } from '../../types/events';
import { queryString, readPage } from '../../utils/request';

import { WebhookService } from './webhook.service';

const LOG_STATUSES: string[] = Object.values(WebhookLogStatus);
const EVENT_TYPES: string[] = Object.values(WebhookEventType);

const isLogStatus = (value: string | undefined): value is WebhookLogStatus =>
  value !== undefined && LOG_STATUSES.includes(value);

const isEventType = (value: string | undefined): value is WebhookEventType =>
  value !== undefined && EVENT_TYPES.includes(value);

export class WebhookController {
  constructor(
    private readonly webhookService: WebhookService,
    private readonly maxPageLimit: number
  ) {}

  /**
   * List dispatch logs
   * GET /webhooks/logs
   */
  async listLogs(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const status = queryString(req, 'status');
      const eventType = queryString(req, 'eventType');
      const filter: WebhookLogFilter = {
        status: isLogStatus(status) ? status : undefined,
        eventType: isEventType(eventType) ? eventType : undefined,
        chargeId: queryString(req, 'chargeId'),
      };

      const result = await this.webhookService.listLogs(filter, readPage(req, this.maxPageLimit));

      res.status(200).json({
        success: true,
        data: {
          logs: result.items,
          pagination: { total: result.total, limit: result.limit, offset: result.offset },
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Dispatch log with its deliveries
   * GET /webhooks/logs/:logId
   */
  async getLog(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const detail = await this.webhookService.getLog(req.params.logId);

      res.status(200).json({
        success: true,
        data: detail,
      });
    } catch (error) {
      next(error);
    }
  }
}
