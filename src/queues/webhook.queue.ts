/**
 * Webhook Queue
 *
 * Handles async charge notifications. Job ids are `<eventType>-<chargeId>`,
 * so each outcome of a charge is announced by one job.
 */

import { Queue, Job } from 'bullmq';

import { createServiceLogger } from '../observability';
import { WebhookEventType } from '../types/events';

import { queueConnection, webhookJobOptions, QUEUE_NAMES, JOB_NAMES } from './queue.config';
import { NotificationQueue, WebhookJobData, WebhookJobResult } from './queue.types';

const log = createServiceLogger('webhook-queue');

let webhookQueue: Queue<WebhookJobData, WebhookJobResult> | null = null;

export const webhookJobId = (eventType: WebhookEventType, chargeId: string): string =>
  `${eventType}-${chargeId}`;

/**
 * Get or create the webhook queue
 */
export function getWebhookQueue(): Queue<WebhookJobData, WebhookJobResult> {
  if (!webhookQueue) {
    webhookQueue = new Queue<WebhookJobData, WebhookJobResult>(QUEUE_NAMES.WEBHOOKS, {
      connection: queueConnection,
      defaultJobOptions: webhookJobOptions,
    });
    log.info('Webhook queue initialized');
  }
  return webhookQueue;
}

/**
 * Add a webhook dispatch job to the queue
 */
export async function enqueueWebhookDispatch(
  eventType: WebhookEventType,
  chargeId: string
): Promise<Job<WebhookJobData, WebhookJobResult>> {
  const queue = getWebhookQueue();
  const job = await queue.add(
    JOB_NAMES.NOTIFY,
    { eventType, chargeId },
    { jobId: webhookJobId(eventType, chargeId) }
  );
  log.debug({ jobId: job.id, eventType, chargeId }, 'Webhook dispatch job added');
  return job;
}

/**
 * NotificationQueue backed by BullMQ
 */
export const bullNotificationQueue: NotificationQueue = {
  async enqueueWebhook(eventType: WebhookEventType, chargeId: string): Promise<void> {
    await enqueueWebhookDispatch(eventType, chargeId);
  },
};

/**
 * Close the webhook queue connection
 */
export async function closeWebhookQueue(): Promise<void> {
  if (webhookQueue) {
    await webhookQueue.close();
    webhookQueue = null;
    log.info('Webhook queue closed');
  }
}

/**
 * Get queue statistics
 */
export async function getWebhookQueueStats(): Promise<{
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}> {
  const queue = getWebhookQueue();
  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);
  return { waiting, active, completed, failed, delayed };
}
