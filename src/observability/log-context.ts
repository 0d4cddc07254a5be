import { AsyncLocalStorage } from 'async_hooks';

/**
 * Fields every log line inside a scope carries.
 *
 * Two places open a scope: `correlationMiddleware` for an HTTP request
 * (correlationId from `x-correlation-id` or a fresh uuid), and the settlement
 * and webhook workers for a BullMQ job (correlationId is the job id, plus the
 * chargeId being settled or notified).
 */
export interface LogContext {
  correlationId: string;
  chargeId?: string;
  jobId?: string;
  [key: string]: unknown;
}

export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

export const getCorrelationId = (): string | undefined => {
  return asyncLocalStorage.getStore()?.correlationId;
};

export const getLogContext = (): LogContext | undefined => {
  return asyncLocalStorage.getStore();
};

/**
 * pino mixin: copies the active scope onto each log line.
 * Fields passed to the log call win over the scope's.
 */
export const logContextMixin = (): Partial<LogContext> => ({ ...getLogContext() });

/**
 * Run `fn` inside a scope. Workers wrap each job so that the settlement
 * engine's logs and error envelopes name the job and charge.
 */
export const runWithContext = <T>(context: LogContext, fn: () => T): T => {
  return asyncLocalStorage.run(context, fn);
};
