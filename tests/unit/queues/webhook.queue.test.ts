/**
 * Webhook Queue Unit Tests
 */

import { WebhookEventType } from '../../../src/types/events';

const mockAdd = jest.fn().mockResolvedValue({ id: 'job-1' });
const mockClose = jest.fn().mockResolvedValue(undefined);

jest.mock('bullmq', () => ({
  Queue: jest.fn().mockImplementation(() => ({
    add: mockAdd,
    close: mockClose,
    getWaitingCount: jest.fn().mockResolvedValue(0),
    getActiveCount: jest.fn().mockResolvedValue(0),
    getCompletedCount: jest.fn().mockResolvedValue(7),
    getFailedCount: jest.fn().mockResolvedValue(1),
    getDelayedCount: jest.fn().mockResolvedValue(0),
  })),
}));

jest.mock('../../../src/queues/queue.config', () => ({
  queueConnection: { host: 'localhost', port: 6379 },
  webhookJobOptions: { attempts: 3, backoff: { type: 'exponential', delay: 1000 } },
  QUEUE_NAMES: { WEBHOOKS: 'webhooks' },
  JOB_NAMES: { NOTIFY: 'notify' },
}));

type WebhookQueueModule = typeof import('../../../src/queues/webhook.queue');

describe('Webhook Queue', () => {
  let queueModule: WebhookQueueModule;

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.resetModules();

    queueModule = await import('../../../src/queues/webhook.queue');
  });

  afterEach(async () => {
    await queueModule.closeWebhookQueue();
  });

  it('builds job ids from the event type and charge id', () => {
    expect(queueModule.webhookJobId(WebhookEventType.CHARGE_FAILED, 'chg_1')).toBe('charge.failed-chg_1');
  });

  it('adds a notify job keyed by event and charge', async () => {
    await queueModule.enqueueWebhookDispatch(WebhookEventType.CHARGE_SUCCEEDED, 'chg_1');

    expect(mockAdd).toHaveBeenCalledWith(
      'notify',
      { eventType: 'charge.succeeded', chargeId: 'chg_1' },
      { jobId: 'charge.succeeded-chg_1' }
    );
  });

  it('is exposed through the NotificationQueue seam', async () => {
    await queueModule.bullNotificationQueue.enqueueWebhook(WebhookEventType.CHARGE_FAILED, 'chg_2');

    expect(mockAdd).toHaveBeenCalledWith(
      'notify',
      { eventType: 'charge.failed', chargeId: 'chg_2' },
      { jobId: 'charge.failed-chg_2' }
    );
  });

  it('creates the queue with webhook job defaults', async () => {
    queueModule.getWebhookQueue();

    const { Queue } = await import('bullmq');
    expect(Queue).toHaveBeenCalledWith('webhooks', {
      connection: { host: 'localhost', port: 6379 },
      defaultJobOptions: { attempts: 3, backoff: { type: 'exponential', delay: 1000 } },
    });
  });

  it('collects job counts', async () => {
    await expect(queueModule.getWebhookQueueStats()).resolves.toEqual({
      waiting: 0,
      active: 0,
      completed: 7,
      failed: 1,
      delayed: 0,
    });
  });
});
