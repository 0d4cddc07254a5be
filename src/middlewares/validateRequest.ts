import { Request, Response, NextFunction } from 'express';
import { validationResult } from 'express-validator';

import { ApiError } from './errorHandler';

/**
 * Reusable validation middleware that extracts express-validator errors
 * and formats them into a consistent error response
 */
export const validateRequest = (req: Request, _res: Response, next: NextFunction): void => {
  const errors = validationResult(req);

  if (!errors.isEmpty()) {
    const details: Record<string, string[]> = {};
    for (const err of errors.array()) {
      const field = err.type === 'field' ? err.path : err.type;
      if (!details[field]) details[field] = [];
      details[field].push(String(err.msg));
    }
    throw ApiError.validationError('Validation failed', details);
  }

  next();
};
