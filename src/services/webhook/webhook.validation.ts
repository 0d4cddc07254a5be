import { query } from 'express-validator';

import { WebhookEventType, WebhookLogStatus } from '../../types/events';
import { idParam, paginationQuery } from '../../utils/validators';

export const listWebhookLogsValidation = (maxLimit: number) => [
  query('status')
    .optional()
    .isIn(Object.values(WebhookLogStatus))
    .withMessage(`Status must be one of: ${Object.values(WebhookLogStatus).join(', ')}`),
  query('eventType')
    .optional()
    .isIn(Object.values(WebhookEventType))
    .withMessage(`Event type must be one of: ${Object.values(WebhookEventType).join(', ')}`),
  query('chargeId').optional().isString(),
  ...paginationQuery(maxLimit),
];

export const webhookLogIdValidation = [idParam('logId', 'Webhook log ID')];
