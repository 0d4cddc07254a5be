/**
 * Webhook API Routes
 */

import { Router, Request, Response, NextFunction } from 'express';

import { validateRequest } from '../../middlewares/validateRequest';

import { WebhookController } from './webhook.controller';
import { listWebhookLogsValidation, webhookLogIdValidation } from './webhook.validation';

export const createWebhookRoutes = (controller: WebhookController, maxPageLimit: number): Router => {
  const router = Router();

  /**
   * GET /webhooks/logs
   * List dispatch logs, newest first
   */
  router.get(
    '/logs',
    listWebhookLogsValidation(maxPageLimit),
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.listLogs(req, res, next)
  );

  /**
   * GET /webhooks/logs/:logId
   * Dispatch log with per-destination deliveries
   */
  router.get(
    '/logs/:logId',
    webhookLogIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getLog(req, res, next)
  );

  return router;
};
