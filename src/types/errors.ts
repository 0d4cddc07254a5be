/**
 * Error Codes for the installment settlement API
 *
 * Categorized by error type:
 * - 2xxx: Validation errors
 * - 3xxx: Business logic errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  INVALID_INPUT = 2003,
  MISSING_REQUIRED_FIELD = 2004,
  INSTALLMENT_AMOUNT_MISMATCH = 2005,

  // Business errors (3xxx)
  INSUFFICIENT_FUNDS = 3001,
  WALLET_NOT_FOUND = 3002,
  CHARGE_NOT_FOUND = 3003,
  ORDER_NOT_FOUND = 3004,
  INSTALLMENT_NOT_FOUND = 3005,
  WEBHOOK_LOG_NOT_FOUND = 3006,
  WALLET_ALREADY_EXISTS = 3007,
  RESOURCE_NOT_FOUND = 3008,
  INVALID_STATE_TRANSITION = 3009,
  CONCURRENT_MODIFICATION = 3010,
  WALLET_INACTIVE = 3011,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  DATABASE_ERROR = 5002,
  REDIS_ERROR = 5003,
  QUEUE_ERROR = 5004,
  WEBHOOK_DELIVERY_ERROR = 5005,
  EXTERNAL_PROCESSOR_ERROR = 5006,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  // Validation errors -> 400
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.MISSING_REQUIRED_FIELD]: 400,
  [ErrorCode.INSTALLMENT_AMOUNT_MISMATCH]: 400,

  // Business errors -> 400/404/409
  [ErrorCode.INSUFFICIENT_FUNDS]: 400,
  [ErrorCode.WALLET_NOT_FOUND]: 404,
  [ErrorCode.CHARGE_NOT_FOUND]: 404,
  [ErrorCode.ORDER_NOT_FOUND]: 404,
  [ErrorCode.INSTALLMENT_NOT_FOUND]: 404,
  [ErrorCode.WEBHOOK_LOG_NOT_FOUND]: 404,
  [ErrorCode.WALLET_ALREADY_EXISTS]: 409,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,
  [ErrorCode.INVALID_STATE_TRANSITION]: 409,
  [ErrorCode.CONCURRENT_MODIFICATION]: 409,
  [ErrorCode.WALLET_INACTIVE]: 409,

  // System errors -> 500/502/503
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.DATABASE_ERROR]: 503,
  [ErrorCode.REDIS_ERROR]: 503,
  [ErrorCode.QUEUE_ERROR]: 503,
  [ErrorCode.WEBHOOK_DELIVERY_ERROR]: 502,
  [ErrorCode.EXTERNAL_PROCESSOR_ERROR]: 502,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, string[]>;
    timestamp: string;
    correlationId?: string;
  };
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T = unknown> {
  success: true;
  data: T;
}

/**
 * API Response type
 */
export type ApiResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;
