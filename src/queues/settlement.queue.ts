/**
 * Settlement Queue
 *
 * One `settle-charge` job per charge. The charge id doubles as the job id so
 * duplicate enqueues collapse onto the same job.
 */

import { Queue, Job } from 'bullmq';

import { createServiceLogger } from '../observability';

import { queueConnection, settlementJobOptions, QUEUE_NAMES, JOB_NAMES } from './queue.config';
import { SettleChargeJobData, SettleChargeJobResult, SettlementQueue } from './queue.types';

const log = createServiceLogger('settlement-queue');

let settlementQueue: Queue<SettleChargeJobData, SettleChargeJobResult> | null = null;

/**
 * Get or create the settlement queue
 */
export function getSettlementQueue(): Queue<SettleChargeJobData, SettleChargeJobResult> {
  if (!settlementQueue) {
    settlementQueue = new Queue<SettleChargeJobData, SettleChargeJobResult>(
      QUEUE_NAMES.SETTLEMENTS,
      {
        connection: queueConnection,
        defaultJobOptions: settlementJobOptions,
      }
    );
    log.info('Settlement queue initialized');
  }
  return settlementQueue;
}

/**
 * Add a settlement job for a charge
 */
export async function enqueueSettlement(
  chargeId: string
): Promise<Job<SettleChargeJobData, SettleChargeJobResult>> {
  const queue = getSettlementQueue();
  const job = await queue.add(JOB_NAMES.SETTLE_CHARGE, { chargeId }, { jobId: chargeId });
  log.debug({ jobId: job.id, chargeId }, 'Settlement job added');
  return job;
}

/**
 * SettlementQueue backed by BullMQ
 */
export const bullSettlementQueue: SettlementQueue = {
  async enqueueSettlement(chargeId: string): Promise<void> {
    await enqueueSettlement(chargeId);
  },
};

/**
 * Close the settlement queue connection
 */
export async function closeSettlementQueue(): Promise<void> {
  if (settlementQueue) {
    await settlementQueue.close();
    settlementQueue = null;
    log.info('Settlement queue closed');
  }
}

/**
 * Get queue statistics
 */
export async function getSettlementQueueStats(): Promise<{
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}> {
  const queue = getSettlementQueue();
  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);
  return { waiting, active, completed, failed, delayed };
}
