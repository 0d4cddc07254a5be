// Logger exports
export { logger, createServiceLogger, Logger } from './logger';

// Log context exports
export {
  LogContext,
  asyncLocalStorage,
  getCorrelationId,
  getLogContext,
  logContextMixin,
  runWithContext,
} from './log-context';

// Correlation middleware
export { correlationMiddleware } from './correlation';

// Metrics exports
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  settlementsTotal,
  settlementDuration,
  compensationsTotal,
  settledAmount,
  walletOperationsTotal,
  webhookDeliveriesTotal,
  webhookDeliveryDuration,
  queueJobsTotal,
  queueJobDuration,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware } from './metrics.middleware';

// Tracing exports
export {
  initTracing,
  shutdownTracing,
  getTracer,
  createSpan,
  traceSettlement,
  traceWebhook,
} from './tracing';
