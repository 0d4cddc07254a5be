import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';

import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'installment-settlement' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

/**
 * Total HTTP requests counter
 */
export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

/**
 * HTTP request duration histogram
 */
export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Settlement Metrics
// ============================================

/**
 * Settlement outcomes by payment method
 */
export const settlementsTotal = new Counter({
  name: 'settlements_total',
  help: 'Charge settlements by outcome and payment method',
  labelNames: ['outcome', 'method'] as const, // succeeded/failed/skipped/error, wallet/external/none
  registers: [registry],
});

/**
 * Settlement duration, including the external processor round trip
 */
export const settlementDuration = new Histogram({
  name: 'settlement_duration_seconds',
  help: 'Charge settlement duration in seconds',
  labelNames: ['outcome'] as const,
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [registry],
});

/**
 * Compensating wallet refunds after external failures
 */
export const compensationsTotal = new Counter({
  name: 'settlement_compensations_total',
  help: 'Wallet refunds issued after an external charge failed',
  labelNames: ['result'] as const, // success, failure
  registers: [registry],
});

/**
 * Amount charged per source
 */
export const settledAmount = new Histogram({
  name: 'settled_amount',
  help: 'Settled amounts by payment source',
  labelNames: ['source'] as const,
  buckets: [10, 50, 100, 500, 1000, 5000, 10000, 50000],
  registers: [registry],
});

// ============================================
// Wallet Metrics
// ============================================

/**
 * Wallet ledger operations counter
 */
export const walletOperationsTotal = new Counter({
  name: 'wallet_operations_total',
  help: 'Wallet ledger operations by type and result',
  labelNames: ['operation', 'result'] as const, // credit/debit, applied/insufficient_funds/not_found
  registers: [registry],
});

// ============================================
// Webhook Metrics
// ============================================

/**
 * Webhook deliveries counter
 */
export const webhookDeliveriesTotal = new Counter({
  name: 'webhook_deliveries_total',
  help: 'Webhook deliveries by status',
  labelNames: ['status'] as const, // success, failure
  registers: [registry],
});

/**
 * Webhook delivery duration
 */
export const webhookDeliveryDuration = new Histogram({
  name: 'webhook_delivery_duration_seconds',
  help: 'Webhook delivery duration in seconds',
  labelNames: ['status'] as const,
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [registry],
});

// ============================================
// Queue Metrics
// ============================================

/**
 * Queue job counter
 */
export const queueJobsTotal = new Counter({
  name: 'queue_jobs_total',
  help: 'Queue jobs by queue and status',
  labelNames: ['queue', 'status'] as const, // queue name, completed/failed
  registers: [registry],
});

/**
 * Queue job processing duration
 */
export const queueJobDuration = new Histogram({
  name: 'queue_job_duration_seconds',
  help: 'Queue job processing duration in seconds',
  labelNames: ['queue'] as const,
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

/**
 * Get all metrics as Prometheus text format
 */
export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

/**
 * Get content type for metrics response
 */
export const getMetricsContentType = (): string => {
  return registry.contentType;
};
