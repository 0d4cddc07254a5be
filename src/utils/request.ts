import { Request } from 'express';

import { Page } from '../types/records';

export const DEFAULT_PAGE_LIMIT = 20;

/**
 * Single-valued query parameter, ignoring repeated or nested forms
 */
export const queryString = (req: Request, name: string): string | undefined => {
  const value = req.query[name];
  return typeof value === 'string' ? value : undefined;
};

/**
 * Offset pagination from `limit`/`offset` query parameters, clamped to maxLimit
 */
export const readPage = (req: Request, maxLimit: number): Page => {
  const limit = parseInt(queryString(req, 'limit') ?? '', 10);
  const offset = parseInt(queryString(req, 'offset') ?? '', 10);
  return {
    limit: Math.min(Number.isNaN(limit) || limit < 1 ? DEFAULT_PAGE_LIMIT : limit, maxLimit),
    offset: Number.isNaN(offset) || offset < 0 ? 0 : offset,
  };
};
