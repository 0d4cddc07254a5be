import { initTracing, shutdownTracing, logger } from './observability';

// Tracing patches modules on load, so start it before the rest of the app
initTracing();

import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { connectRedis, disconnectRedis } from './config/redis';
import { buildContainer } from './container';
import { closeSettlementQueue, closeWebhookQueue } from './queues';

const startServer = async (): Promise<void> => {
  try {
    await connectDatabase();
    await connectRedis();

    const container = buildContainer();
    const app = createApp(container);

    const server = app.listen(config.port, () => {
      logger.info({ port: config.port, ...getEnvironmentInfo() }, 'HTTP server listening');
    });

    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Starting graceful shutdown');

      server.close(async () => {
        logger.info('HTTP server closed');

        try {
          await closeSettlementQueue();
          await closeWebhookQueue();
          await disconnectRedis();
          await disconnectDatabase();
          await shutdownTracing();
          logger.info('Graceful shutdown completed');
          process.exit(0);
        } catch (error) {
          logger.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        }
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
