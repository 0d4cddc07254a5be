/**
 * BullMQ Queue Configuration
 *
 * Provides connection settings and default job options for all queues.
 */

import { ConnectionOptions, DefaultJobOptions } from 'bullmq';

import { config } from '../config';

/**
 * Redis connection configuration for BullMQ
 */
export const queueConnection: ConnectionOptions = {
  host: config.redis.host,
  port: config.redis.port,
  password: config.redis.password,
  maxRetriesPerRequest: null, // Required for BullMQ workers
};

/**
 * Default job options for charge settlement
 */
export const settlementJobOptions: DefaultJobOptions = {
  attempts: config.settlement.jobAttempts,
  backoff: {
    type: 'exponential',
    delay: 2000, // 2s, 4s, 8s
  },
  removeOnComplete: {
    count: 1000,
  },
  removeOnFail: {
    count: 5000,
  },
};

/**
 * Default job options for webhook dispatch
 */
export const webhookJobOptions: DefaultJobOptions = {
  attempts: config.webhook.jobAttempts,
  backoff: {
    type: 'exponential',
    delay: 1000, // 1s, 2s, 4s
  },
  removeOnComplete: {
    count: 100,
  },
  removeOnFail: {
    count: 1000,
  },
};

/**
 * Default job options for the due-installment sweep
 */
export const schedulerJobOptions: DefaultJobOptions = {
  attempts: 1,
  removeOnComplete: {
    count: 30,
  },
  removeOnFail: {
    count: 100,
  },
};

/**
 * Queue names
 * Note: BullMQ doesn't allow colons in queue names as they are used as Redis key separators
 */
export const QUEUE_NAMES = {
  SETTLEMENTS: 'settlements',
  WEBHOOKS: 'webhooks',
  SCHEDULER: 'scheduler',
} as const;

export const JOB_NAMES = {
  SETTLE_CHARGE: 'settle-charge',
  NOTIFY: 'notify',
  PROCESS_DUE_INSTALLMENTS: 'process-due-installments',
} as const;

/**
 * Worker concurrency settings
 */
export const WORKER_CONCURRENCY = {
  SETTLEMENTS: config.settlement.concurrency,
  WEBHOOKS: 5,
  SCHEDULER: 1,
} as const;
