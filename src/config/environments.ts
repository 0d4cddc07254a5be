/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, WEBHOOK_CONFIG } from './environments';
 *
 *   if (isProduction) { ... }
 *   const urls = WEBHOOK_CONFIG.urls;
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

/**
 * Environment detection flags
 * Use these instead of checking NODE_ENV directly
 */
export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

/**
 * Local development flag
 * Set LOCAL_DEV=true to use localhost URLs even in non-development environments
 */
export const isLocalDev = process.env.LOCAL_DEV === 'true';

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

/**
 * MongoDB URI by environment
 * Wallet ledger writes use multi-document transactions, so the target must be a replica set.
 */
export const MONGODB_URI = isProduction
  ? process.env.MONGODB_URI || 'mongodb://mongodb:27017/installments?replicaSet=rs0'
  : isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/installments-test?replicaSet=rs0'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/installments?replicaSet=rs0';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// REDIS CONFIGURATION
// =============================================================================

/**
 * Redis host by environment
 */
export const REDIS_HOST = isProduction
  ? process.env.REDIS_HOST || 'redis'
  : process.env.REDIS_HOST || 'localhost';

/**
 * Redis port by environment
 */
export const REDIS_PORT = parseInt(
  process.env.REDIS_PORT || (isTest ? '6380' : '6379'),
  10
);

/**
 * Redis password (production only)
 */
export const REDIS_PASSWORD = isProduction
  ? process.env.REDIS_PASSWORD || undefined
  : undefined;

// =============================================================================
// WEBHOOK CONFIGURATION
// =============================================================================

/**
 * Split a comma-separated destination list, dropping blank entries
 */
export const parseWebhookUrls = (raw: string | undefined): string[] =>
  (raw || '')
    .split(',')
    .map((url) => url.trim())
    .filter((url) => url.length > 0);

/**
 * Webhook delivery configuration
 */
export const WEBHOOK_CONFIG = {
  urls: parseWebhookUrls(process.env.WEBHOOK_URLS),
  timeoutMs: parseInt(process.env.WEBHOOK_TIMEOUT_MS || '30000', 10),
  signingSecret: process.env.WEBHOOK_SIGNING_SECRET || undefined,
  jobAttempts: parseInt(process.env.WEBHOOK_JOB_ATTEMPTS || '3', 10),
  maxPageLimit: parseInt(process.env.WEBHOOK_MAX_PAGE_LIMIT || '100', 10),
};

// =============================================================================
// PAYMENT PROCESSOR CONFIGURATION
// =============================================================================

/**
 * External payment processor (card charges for wallet shortfalls)
 */
export const PAYMENT_PROCESSOR_CONFIG = {
  baseUrl: isProduction
    ? process.env.PAYMENT_PROCESSOR_BASE_URL || ''
    : process.env.PAYMENT_PROCESSOR_BASE_URL || 'http://localhost:4010/v1',
  apiKey: process.env.PAYMENT_PROCESSOR_API_KEY || '',
  timeoutMs: parseInt(process.env.PAYMENT_PROCESSOR_TIMEOUT_MS || '30000', 10),
};

// =============================================================================
// SETTLEMENT / SCHEDULER CONFIGURATION
// =============================================================================

/**
 * Settlement job configuration
 */
export const SETTLEMENT_CONFIG = {
  jobAttempts: parseInt(process.env.SETTLEMENT_JOB_ATTEMPTS || '3', 10),
  concurrency: parseInt(process.env.SETTLEMENT_CONCURRENCY || '5', 10),
};

/**
 * Due-installment sweep, daily at 09:00 UTC unless overridden
 */
export const SCHEDULER_CONFIG = {
  enabled: process.env.SCHEDULER_ENABLED !== 'false',
  cron: process.env.SCHEDULER_CRON || '0 9 * * *',
  timezone: process.env.SCHEDULER_TZ || 'UTC',
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

/**
 * API configuration
 */
export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '100kb',
  port: parseInt(process.env.PORT || '3000', 10),
  corsOrigins: isProduction
    ? (process.env.CORS_ORIGINS || '').split(',').filter(Boolean)
    : ['http://localhost:3000', 'http://localhost:3001', 'http://127.0.0.1:3000'],
  maxPageLimit: 100,
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

/**
 * Logging configuration by environment
 */
export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: !isProduction && !isTest,
};

// =============================================================================
// OBSERVABILITY / TELEMETRY
// =============================================================================

/**
 * OpenTelemetry configuration
 */
export const OTEL_CONFIG = {
  enabled: isProduction || process.env.OTEL_ENABLED === 'true',
  serviceName: process.env.OTEL_SERVICE_NAME || 'installment-settlement',
  exporterEndpoint: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
};

// =============================================================================
// SECURITY CONFIGURATION
// =============================================================================

/**
 * Security-related configuration
 */
export const SECURITY_CONFIG = {
  // Helmet configuration
  contentSecurityPolicy: isProduction,
  hsts: isProduction,
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = [
    'MONGODB_URI',
    'REDIS_HOST',
    'REDIS_PASSWORD',
    'PAYMENT_PROCESSOR_BASE_URL',
    'PAYMENT_PROCESSOR_API_KEY',
  ];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }

  if (WEBHOOK_CONFIG.urls.length === 0) {
    throw new Error('WEBHOOK_URLS must list at least one destination in production');
  }
};

// =============================================================================
// DEBUG / INFO
// =============================================================================

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  isLocalDev,
  mongoHost: MONGODB_URI.split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
  redisHost: REDIS_HOST,
  webhookDestinations: WEBHOOK_CONFIG.urls.length,
});
