import { Request, Response, NextFunction } from 'express';

import { httpRequestsTotal, httpRequestDuration } from './metrics';

/**
 * Collapse dynamic path segments so label cardinality stays bounded.
 * Record ids look like `chg_<uuid>`; the prefix is folded into the placeholder.
 */
export const normalizePath = (path: string): string => {
  let normalized = path.replace(
    /(?:[a-z]{3}_)?[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi,
    ':id'
  );

  // Customer ids and other free-form path params after a known collection
  normalized = normalized.replace(/^\/wallets\/(?!:id)[^/]+/, '/wallets/:customerId');

  normalized = normalized.replace(/\/\d+(?=\/|$)/g, '/:id');

  return normalized;
};

const getRoutePath = (req: Request): string => {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return (req.baseUrl || '') + routePath;
  }

  return normalizePath(req.path);
};

/**
 * HTTP metrics middleware
 * Records request count and duration for Prometheus
 */
export const metricsMiddleware = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (req.path === '/metrics') {
    next();
    return;
  }

  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;

    const labels = {
      method: req.method,
      path: getRoutePath(req),
      status: res.statusCode.toString(),
    };

    httpRequestsTotal.inc(labels);
    httpRequestDuration.observe(labels, durationSeconds);
  });

  next();
};
