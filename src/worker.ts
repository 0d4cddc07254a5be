import { initTracing, shutdownTracing, logger } from './observability';

initTracing();

import { config } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { connectRedis, disconnectRedis } from './config/redis';
import { buildContainer } from './container';
import {
  closeSchedulerQueue,
  closeSettlementQueue,
  closeWebhookQueue,
  scheduleDueInstallmentSweep,
  startSchedulerWorker,
  startSettlementWorker,
  startWebhookWorker,
  stopSchedulerWorker,
  stopSettlementWorker,
  stopWebhookWorker,
} from './queues';

const startWorkers = async (): Promise<void> => {
  try {
    await connectDatabase();
    await connectRedis();

    const container = buildContainer();

    startSettlementWorker(container.settlementService);
    startWebhookWorker(container.webhookService);

    if (config.scheduler.enabled) {
      startSchedulerWorker(container.installmentService);
      await scheduleDueInstallmentSweep({
        cron: config.scheduler.cron,
        timezone: config.scheduler.timezone,
      });
    } else {
      logger.info('Due-installment scheduler disabled');
    }

    const shutdown = async (signal: string): Promise<void> => {
      logger.info({ signal }, 'Stopping workers');

      const forceExit = setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 30000);
      forceExit.unref();

      try {
        await stopSchedulerWorker();
        await stopSettlementWorker();
        await stopWebhookWorker();
        await closeSchedulerQueue();
        await closeSettlementQueue();
        await closeWebhookQueue();
        await disconnectRedis();
        await disconnectDatabase();
        await shutdownTracing();
        logger.info('Worker shutdown completed');
        process.exit(0);
      } catch (error) {
        logger.error({ err: error }, 'Error during worker shutdown');
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start workers');
    process.exit(1);
  }
};

void startWorkers();
