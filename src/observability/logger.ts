import pino from 'pino';

import { config } from '../config';

import { logContextMixin } from './log-context';

/**
 * Pino logger configuration
 * - Production: JSON logs at info level
 * - Development: Pretty printed logs at debug level
 * - Test: Silent unless LOG_LEVEL says otherwise
 */
export const logger = pino({
  level: config.logging.level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'installment-settlement',
    env: config.nodeEnv,
  },
  mixin: logContextMixin,
  ...(config.logging.prettyPrint && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

export type Logger = pino.Logger;

// Child logger factory for service-specific logging
export const createServiceLogger = (serviceName: string): Logger => {
  return logger.child({ component: serviceName });
};
