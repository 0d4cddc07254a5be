/**
 * External payment processor contract
 */

export interface ProcessorChargeRequest {
  /** Integer minor units (cents) */
  amountMinor: number;
  /** Lower-case ISO currency code */
  currency: string;
  customerReference: string;
  description: string;
  metadata: Record<string, string | null>;
  idempotencyKey: string;
}

export interface ProcessorChargeResponse {
  externalChargeId: string;
}

export interface PaymentProcessor {
  /**
   * Resolves with the processor's reference on success,
   * rejects with PaymentProcessorError when the processor declines or is unreachable
   */
  charge(request: ProcessorChargeRequest): Promise<ProcessorChargeResponse>;
}

export class PaymentProcessorError extends Error {
  readonly code: string | null;
  readonly statusCode: number | null;

  constructor(message: string, options?: { code?: string | null; statusCode?: number | null }) {
    super(message);
    this.name = 'PaymentProcessorError';
    this.code = options?.code ?? null;
    this.statusCode = options?.statusCode ?? null;
  }
}
