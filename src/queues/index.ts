/**
 * Queue Module Exports
 */

// Configuration
export {
  queueConnection,
  settlementJobOptions,
  webhookJobOptions,
  schedulerJobOptions,
  QUEUE_NAMES,
  JOB_NAMES,
  WORKER_CONCURRENCY,
} from './queue.config';

// Job and seam types
export type {
  SettleChargeJobData,
  SettleChargeJobResult,
  WebhookJobData,
  WebhookJobResult,
  SchedulerJobData,
  SchedulerJobResult,
  SettlementQueue,
  NotificationQueue,
} from './queue.types';

// Settlement Queue
export {
  getSettlementQueue,
  enqueueSettlement,
  bullSettlementQueue,
  closeSettlementQueue,
  getSettlementQueueStats,
} from './settlement.queue';

// Webhook Queue
export {
  getWebhookQueue,
  enqueueWebhookDispatch,
  bullNotificationQueue,
  webhookJobId,
  closeWebhookQueue,
  getWebhookQueueStats,
} from './webhook.queue';

// Scheduler Queue
export {
  getSchedulerQueue,
  scheduleDueInstallmentSweep,
  closeSchedulerQueue,
} from './scheduler.queue';
export type { SweepSchedule } from './scheduler.queue';

// Workers
export {
  startSettlementWorker,
  stopSettlementWorker,
  isSettlementWorkerRunning,
  createSettlementProcessor,
} from './workers/settlement.worker';

export {
  startWebhookWorker,
  stopWebhookWorker,
  isWebhookWorkerRunning,
  createWebhookProcessor,
} from './workers/webhook.worker';

export {
  startSchedulerWorker,
  stopSchedulerWorker,
  isSchedulerWorkerRunning,
  createSchedulerProcessor,
} from './workers/scheduler.worker';
