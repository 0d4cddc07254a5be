import { Job } from 'bullmq';

import { queueJobDuration, queueJobsTotal } from '../../observability';

/**
 * The parts of a BullMQ job the processors read
 */
export type JobLike<D> = Pick<Job<D>, 'id' | 'data' | 'attemptsMade'>;

/**
 * Wrap a job processor with completion counters and a duration histogram
 */
export function withJobMetrics<J, R>(
  queueName: string,
  processor: (job: J) => Promise<R>
): (job: J) => Promise<R> {
  return async (job: J): Promise<R> => {
    const endTimer = queueJobDuration.startTimer({ queue: queueName });
    try {
      const result = await processor(job);
      queueJobsTotal.inc({ queue: queueName, status: 'completed' });
      return result;
    } catch (error) {
      queueJobsTotal.inc({ queue: queueName, status: 'failed' });
      throw error;
    } finally {
      endTimer();
    }
  };
}
