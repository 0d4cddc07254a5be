import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

// Import environment-specific configurations
import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  isLocalDev,
  MONGODB_URI,
  MONGODB_CONFIG,
  REDIS_HOST,
  REDIS_PORT,
  REDIS_PASSWORD,
  WEBHOOK_CONFIG,
  PAYMENT_PROCESSOR_CONFIG,
  SETTLEMENT_CONFIG,
  SCHEDULER_CONFIG,
  API_CONFIG,
  LOG_CONFIG,
  OTEL_CONFIG,
  SECURITY_CONFIG,
  validateProductionEnv,
  getEnvironmentInfo,
} from './environments';

// Re-export environment utilities
export {
  isProduction,
  isDevelopment,
  isTest,
  isLocalDev,
  validateProductionEnv,
  getEnvironmentInfo,
};

// Re-export environment-specific configs for direct access
export * from './environments';

// Validate production environment variables on startup
if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object
 *
 * Only the composition root (src/container.ts), the bootstrap files and the
 * observability layer read this directly. Business components receive the
 * slice they need through their constructor.
 */
export const config = {
  // Environment
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  isLocalDev,

  // Server
  port: API_CONFIG.port,

  // MongoDB
  mongodb: {
    uri: MONGODB_URI,
    ...MONGODB_CONFIG,
  },

  // Redis
  redis: {
    host: REDIS_HOST,
    port: REDIS_PORT,
    password: REDIS_PASSWORD,
  },

  // API
  api: {
    bodyLimit: API_CONFIG.bodyLimit,
    corsOrigins: API_CONFIG.corsOrigins,
    maxPageLimit: API_CONFIG.maxPageLimit,
  },

  // Webhooks
  webhook: WEBHOOK_CONFIG,

  // External payment processor
  paymentProcessor: PAYMENT_PROCESSOR_CONFIG,

  // Settlement and scheduling
  settlement: SETTLEMENT_CONFIG,
  scheduler: SCHEDULER_CONFIG,

  // Logging
  logging: LOG_CONFIG,

  // Observability
  otel: OTEL_CONFIG,

  // Security
  security: SECURITY_CONFIG,
};

export type AppConfig = typeof config;
