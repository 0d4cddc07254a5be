/**
 * Scheduler Queue
 *
 * Holds the repeatable due-installment sweep.
 */

import { Queue, Job } from 'bullmq';

import { createServiceLogger } from '../observability';

import { queueConnection, schedulerJobOptions, QUEUE_NAMES, JOB_NAMES } from './queue.config';
import { SchedulerJobData, SchedulerJobResult } from './queue.types';

const log = createServiceLogger('scheduler-queue');

let schedulerQueue: Queue<SchedulerJobData, SchedulerJobResult> | null = null;

export interface SweepSchedule {
  cron: string;
  timezone: string;
}

/**
 * Get or create the scheduler queue
 */
export function getSchedulerQueue(): Queue<SchedulerJobData, SchedulerJobResult> {
  if (!schedulerQueue) {
    schedulerQueue = new Queue<SchedulerJobData, SchedulerJobResult>(QUEUE_NAMES.SCHEDULER, {
      connection: queueConnection,
      defaultJobOptions: schedulerJobOptions,
    });
    log.info('Scheduler queue initialized');
  }
  return schedulerQueue;
}

/**
 * Register the repeatable sweep. Re-registering the same pattern is a no-op.
 */
export async function scheduleDueInstallmentSweep(
  schedule: SweepSchedule
): Promise<Job<SchedulerJobData, SchedulerJobResult>> {
  const queue = getSchedulerQueue();
  const job = await queue.add(
    JOB_NAMES.PROCESS_DUE_INSTALLMENTS,
    { source: 'repeat' },
    {
      repeat: { pattern: schedule.cron, tz: schedule.timezone },
      jobId: JOB_NAMES.PROCESS_DUE_INSTALLMENTS,
    }
  );
  log.info({ cron: schedule.cron, timezone: schedule.timezone }, 'Due-installment sweep scheduled');
  return job;
}

/**
 * Close the scheduler queue connection
 */
export async function closeSchedulerQueue(): Promise<void> {
  if (schedulerQueue) {
    await schedulerQueue.close();
    schedulerQueue = null;
    log.info('Scheduler queue closed');
  }
}
