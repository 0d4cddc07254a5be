/**
 * Settlement Worker
 *
 * Runs the settlement engine for each `settle-charge` job. Errors that struck
 * before the charge was claimed are thrown so BullMQ retries the job; every
 * other outcome completes it.
 */

import { Worker } from 'bullmq';

import { createServiceLogger, runWithContext } from '../../observability';
import { SettlementService } from '../../services/settlement';
import { queueConnection, QUEUE_NAMES, WORKER_CONCURRENCY } from '../queue.config';
import { SettleChargeJobData, SettleChargeJobResult } from '../queue.types';

import { JobLike, withJobMetrics } from './job-metrics';

const log = createServiceLogger('settlement-worker');

let settlementWorker: Worker<SettleChargeJobData, SettleChargeJobResult> | null = null;

/**
 * Build the job processor for a settlement service
 */
export function createSettlementProcessor(
  settlementService: SettlementService
): (job: JobLike<SettleChargeJobData>) => Promise<SettleChargeJobResult> {
  return async (job) => {
    const { chargeId } = job.data;

    return runWithContext(
      { correlationId: job.id ?? chargeId, chargeId, jobId: job.id },
      async () => {
        log.info({ jobId: job.id, chargeId, attempt: job.attemptsMade + 1 }, 'Processing settlement job');

        const result = await settlementService.settle(chargeId);

        if (result.outcome === 'error') {
          if (result.retryable) {
            throw new Error(`Settlement of ${chargeId} failed before claim: ${result.message}`);
          }
          log.error(
            { chargeId, errorCode: result.errorCode, message: result.message },
            'Settlement ended with a non-retryable error'
          );
        }

        return { outcome: result.outcome };
      }
    );
  };
}

/**
 * Handle worker events
 */
function setupWorkerEvents(worker: Worker<SettleChargeJobData, SettleChargeJobResult>): void {
  worker.on('completed', (job, result) => {
    log.info({ jobId: job.id, outcome: result.outcome }, 'Settlement job completed');
  });

  worker.on('failed', (job, err) => {
    if (!job) return;
    const maxAttempts = job.opts.attempts ?? 1;
    log.error(
      { jobId: job.id, attempt: job.attemptsMade, maxAttempts, err: err.message },
      'Settlement job failed'
    );
  });

  worker.on('error', (err) => {
    log.error({ err }, 'Settlement worker error');
  });
}

/**
 * Start the settlement worker
 */
export function startSettlementWorker(
  settlementService: SettlementService
): Worker<SettleChargeJobData, SettleChargeJobResult> {
  if (settlementWorker) {
    return settlementWorker;
  }

  settlementWorker = new Worker<SettleChargeJobData, SettleChargeJobResult>(
    QUEUE_NAMES.SETTLEMENTS,
    withJobMetrics(QUEUE_NAMES.SETTLEMENTS, createSettlementProcessor(settlementService)),
    {
      connection: queueConnection,
      concurrency: WORKER_CONCURRENCY.SETTLEMENTS,
    }
  );

  setupWorkerEvents(settlementWorker);
  log.info('Settlement worker started');

  return settlementWorker;
}

/**
 * Stop the settlement worker
 */
export async function stopSettlementWorker(): Promise<void> {
  if (settlementWorker) {
    await settlementWorker.close();
    settlementWorker = null;
    log.info('Settlement worker stopped');
  }
}

/**
 * Check if worker is running
 */
export function isSettlementWorkerRunning(): boolean {
  return settlementWorker !== null && !settlementWorker.closing;
}
