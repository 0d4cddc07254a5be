/**
 * Redis Client Configuration
 *
 * Shared Redis client used for readiness probes. BullMQ opens its own
 * connections from the same settings (see queues/queue.config.ts).
 */

import Redis from 'ioredis';

import { createServiceLogger } from '../observability/logger';

import { config } from './index';

const log = createServiceLogger('redis');

let redisClient: Redis | null = null;

/**
 * Get or create Redis client singleton
 */
export const getRedisClient = (): Redis => {
  if (!redisClient) {
    redisClient = new Redis({
      host: config.redis.host,
      port: config.redis.port,
      password: config.redis.password,
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 100, 3000);
      },
      lazyConnect: true,
    });

    redisClient.on('error', (err) => {
      log.error({ err }, 'Redis client error');
    });

    redisClient.on('connect', () => {
      log.info('Redis client connected');
    });
  }

  return redisClient;
};

/**
 * Connect Redis client
 */
export const connectRedis = async (): Promise<void> => {
  const client = getRedisClient();
  if (client.status === 'ready') {
    return;
  }
  await client.connect();
};

/**
 * Disconnect Redis client
 */
export const disconnectRedis = async (): Promise<void> => {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
};

/**
 * Check if Redis is connected
 */
export const isRedisConnected = (): boolean => {
  return redisClient?.status === 'ready';
};
