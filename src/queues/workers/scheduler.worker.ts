/**
 * Scheduler Worker
 *
 * Runs the due-installment sweep when the repeatable job fires.
 */

import { Worker } from 'bullmq';

import { createServiceLogger } from '../../observability';
import { InstallmentService } from '../../services/installment';
import { queueConnection, QUEUE_NAMES, WORKER_CONCURRENCY } from '../queue.config';
import { SchedulerJobData, SchedulerJobResult } from '../queue.types';

import { JobLike, withJobMetrics } from './job-metrics';

const log = createServiceLogger('scheduler-worker');

let schedulerWorker: Worker<SchedulerJobData, SchedulerJobResult> | null = null;

/**
 * Build the job processor for an installment service
 */
export function createSchedulerProcessor(
  installmentService: InstallmentService
): (job: JobLike<SchedulerJobData>) => Promise<SchedulerJobResult> {
  return async (job) => {
    log.info({ jobId: job.id, source: job.data.source }, 'Running due-installment sweep');

    const result = await installmentService.processDueInstallments();

    if (result.failures.length > 0) {
      log.warn({ failures: result.failures }, 'Some installments could not be charged');
    }

    return {
      processedCount: result.processedCount,
      skippedCount: result.skippedCount,
      failureCount: result.failures.length,
    };
  };
}

/**
 * Start the scheduler worker
 */
export function startSchedulerWorker(
  installmentService: InstallmentService
): Worker<SchedulerJobData, SchedulerJobResult> {
  if (schedulerWorker) {
    return schedulerWorker;
  }

  schedulerWorker = new Worker<SchedulerJobData, SchedulerJobResult>(
    QUEUE_NAMES.SCHEDULER,
    withJobMetrics(QUEUE_NAMES.SCHEDULER, createSchedulerProcessor(installmentService)),
    {
      connection: queueConnection,
      concurrency: WORKER_CONCURRENCY.SCHEDULER,
    }
  );

  schedulerWorker.on('completed', (job, result) => {
    log.info({ jobId: job.id, ...result }, 'Due-installment sweep completed');
  });
  schedulerWorker.on('failed', (job, err) => {
    log.error({ jobId: job?.id, err: err.message }, 'Due-installment sweep failed');
  });
  schedulerWorker.on('error', (err) => {
    log.error({ err }, 'Scheduler worker error');
  });

  log.info('Scheduler worker started');
  return schedulerWorker;
}

/**
 * Stop the scheduler worker
 */
export async function stopSchedulerWorker(): Promise<void> {
  if (schedulerWorker) {
    await schedulerWorker.close();
    schedulerWorker = null;
    log.info('Scheduler worker stopped');
  }
}

/**
 * Check if worker is running
 */
export function isSchedulerWorkerRunning(): boolean {
  return schedulerWorker !== null && !schedulerWorker.closing;
}
