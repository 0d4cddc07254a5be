/**
 * Webhook Worker
 *
 * Dispatches charge notifications. Delivery failures are already recorded
 * on the webhook log, so only infrastructure errors reach BullMQ's retry.
 */

import { Worker, UnrecoverableError } from 'bullmq';

import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger, runWithContext } from '../../observability';
import { WebhookService } from '../../services/webhook';
import { ErrorCode } from '../../types/errors';
import { queueConnection, QUEUE_NAMES, WORKER_CONCURRENCY } from '../queue.config';
import { WebhookJobData, WebhookJobResult } from '../queue.types';

import { JobLike, withJobMetrics } from './job-metrics';

const log = createServiceLogger('webhook-worker');

let webhookWorker: Worker<WebhookJobData, WebhookJobResult> | null = null;

/**
 * Build the job processor for a webhook service
 */
export function createWebhookProcessor(
  webhookService: WebhookService
): (job: JobLike<WebhookJobData>) => Promise<WebhookJobResult> {
  return async (job) => {
    const { eventType, chargeId } = job.data;

    return runWithContext(
      { correlationId: job.id ?? chargeId, chargeId, jobId: job.id },
      async () => {
        log.info({ jobId: job.id, eventType, chargeId }, 'Processing webhook job');

        try {
          const result = await webhookService.dispatch(eventType, chargeId);
          return { logId: result.logId, status: result.status };
        } catch (error) {
          if (error instanceof ApiError && error.errorCode === ErrorCode.CHARGE_NOT_FOUND) {
            // Retrying cannot make the charge appear
            throw new UnrecoverableError(`Charge ${chargeId} not found`);
          }
          throw error;
        }
      }
    );
  };
}

/**
 * Handle worker events
 */
function setupWorkerEvents(worker: Worker<WebhookJobData, WebhookJobResult>): void {
  worker.on('completed', (job, result) => {
    log.info({ jobId: job.id, logId: result.logId, status: result.status }, 'Webhook job completed');
  });

  worker.on('failed', (job, err) => {
    if (!job) return;
    const maxAttempts = job.opts.attempts ?? 1;
    log.error(
      { jobId: job.id, attempt: job.attemptsMade, maxAttempts, err: err.message },
      'Webhook job failed'
    );
  });

  worker.on('error', (err) => {
    log.error({ err }, 'Webhook worker error');
  });
}

/**
 * Start the webhook worker
 */
export function startWebhookWorker(
  webhookService: WebhookService
): Worker<WebhookJobData, WebhookJobResult> {
  if (webhookWorker) {
    return webhookWorker;
  }

  webhookWorker = new Worker<WebhookJobData, WebhookJobResult>(
    QUEUE_NAMES.WEBHOOKS,
    withJobMetrics(QUEUE_NAMES.WEBHOOKS, createWebhookProcessor(webhookService)),
    {
      connection: queueConnection,
      concurrency: WORKER_CONCURRENCY.WEBHOOKS,
    }
  );

  setupWorkerEvents(webhookWorker);
  log.info('Webhook worker started');

  return webhookWorker;
}

/**
 * Stop the webhook worker
 */
export async function stopWebhookWorker(): Promise<void> {
  if (webhookWorker) {
    await webhookWorker.close();
    webhookWorker = null;
    log.info('Webhook worker stopped');
  }
}

/**
 * Check if worker is running
 */
export function isWebhookWorkerRunning(): boolean {
  return webhookWorker !== null && !webhookWorker.closing;
}
