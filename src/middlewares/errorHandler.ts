/**
 * Error Handling Middleware
 *
 * Provides centralized error handling with consistent error response format,
 * error logging, and error sanitization for production.
 */

import { Request, Response, NextFunction } from 'express';

import { config } from '../config';
import { logger, getCorrelationId } from '../observability';
import { ErrorCode, ErrorResponse, errorCodeToStatus } from '../types/errors';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
}

/**
 * Body parser failures carry a status and a type instead of an ErrorCode
 */
const isBodyParserError = (err: AppError): err is AppError & { status: number; type: string } =>
  'type' in err && 'status' in err && typeof err.status === 'number';

/**
 * Main error handler middleware
 *
 * Catches all errors and returns a consistent JSON response format.
 * Logs errors with correlation ID for traceability.
 */
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const parserError = isBodyParserError(err);
  const errorCode = err.errorCode || (parserError ? ErrorCode.INVALID_INPUT : ErrorCode.INTERNAL_ERROR);
  const statusCode =
    err.statusCode || (parserError ? err.status : errorCodeToStatus[errorCode]) || 500;

  const logPayload = {
    correlationId,
    errorCode,
    statusCode,
    error: err.message,
    stack: config.isDevelopment ? err.stack : undefined,
    path: req.path,
    method: req.method,
    isOperational: err.isOperational,
  };

  if (statusCode >= 500) {
    logger.error(logPayload, `Error: ${err.message}`);
  } else {
    logger.warn(logPayload, `Request rejected: ${err.message}`);
  }

  // Sanitize error message for production 5xx errors
  const message =
    config.isProduction && statusCode >= 500
      ? 'Internal server error'
      : err.message || 'An error occurred';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  if (err.validationErrors) {
    response.error.details = err.validationErrors;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  res.status(404).json(response);
};

/**
 * API Error class for throwing operational errors
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: Record<string, string[]>;

  constructor(
    errorCode: ErrorCode,
    message: string,
    options?: {
      statusCode?: number;
      isOperational?: boolean;
      validationErrors?: Record<string, string[]>;
    }
  ) {
    super(message);
    this.name = 'ApiError';
    this.errorCode = errorCode;
    this.statusCode = options?.statusCode || errorCodeToStatus[errorCode] || 500;
    this.isOperational = options?.isOperational ?? true;
    this.validationErrors = options?.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Factory methods for common errors
   */
  static validationError(
    message: string,
    validationErrors?: Record<string, string[]>
  ): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, {
      validationErrors,
    });
  }

  static invalidAmount(message = 'Amount must be positive'): ApiError {
    return new ApiError(ErrorCode.INVALID_AMOUNT, message);
  }

  static amountMismatch(message: string): ApiError {
    return new ApiError(ErrorCode.INSTALLMENT_AMOUNT_MISMATCH, message);
  }

  static insufficientFunds(message = 'Insufficient funds'): ApiError {
    return new ApiError(ErrorCode.INSUFFICIENT_FUNDS, message);
  }

  static notFound(resource: string): ApiError {
    const codeMap: Record<string, ErrorCode> = {
      wallet: ErrorCode.WALLET_NOT_FOUND,
      charge: ErrorCode.CHARGE_NOT_FOUND,
      order: ErrorCode.ORDER_NOT_FOUND,
      installment: ErrorCode.INSTALLMENT_NOT_FOUND,
      'webhook log': ErrorCode.WEBHOOK_LOG_NOT_FOUND,
    };
    const code = codeMap[resource.toLowerCase()] || ErrorCode.RESOURCE_NOT_FOUND;
    return new ApiError(code, `${resource} not found`);
  }

  static invalidTransition(resource: string, from: string, to: string): ApiError {
    return new ApiError(
      ErrorCode.INVALID_STATE_TRANSITION,
      `Invalid ${resource} state transition: ${from} -> ${to}`
    );
  }

  static alreadyExists(resource: string): ApiError {
    const codeMap: Record<string, ErrorCode> = {
      wallet: ErrorCode.WALLET_ALREADY_EXISTS,
    };
    const code = codeMap[resource.toLowerCase()] || ErrorCode.VALIDATION_ERROR;
    return new ApiError(code, `${resource} already exists`);
  }

  static walletInactive(message = 'Wallet is inactive'): ApiError {
    return new ApiError(ErrorCode.WALLET_INACTIVE, message);
  }

  static concurrentModification(message = 'Record was modified concurrently'): ApiError {
    return new ApiError(ErrorCode.CONCURRENT_MODIFICATION, message);
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, {
      isOperational: false,
    });
  }

  static database(message = 'Database error'): ApiError {
    return new ApiError(ErrorCode.DATABASE_ERROR, message);
  }

  static queue(message = 'Queue unavailable'): ApiError {
    return new ApiError(ErrorCode.QUEUE_ERROR, message);
  }
}
