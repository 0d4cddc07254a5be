import { ErrorCode } from '../../types/errors';
import { ChargeStatus, PaymentMethod } from '../../types/events';

export type SettlementOutcome = 'succeeded' | 'failed' | 'skipped' | 'error';

interface SettledResult {
  chargeId: string;
  paymentMethod: PaymentMethod;
  /** Portion taken from the wallet and kept */
  walletAmount: number;
  externalAmount: number;
  externalChargeId: string | null;
  /** Installment, order or notification follow-ups that did not complete */
  followUpErrors: string[];
}

export interface SettlementSucceeded extends SettledResult {
  outcome: 'succeeded';
}

export interface SettlementFailed extends SettledResult {
  outcome: 'failed';
  failureReason: string;
  /** Amount credited back to the wallet after the processor declined */
  refundedAmount: number;
}

export interface SettlementSkipped {
  outcome: 'skipped';
  chargeId: string;
  status: ChargeStatus;
  reason: 'ALREADY_SETTLED' | 'IN_PROGRESS' | 'CLAIM_LOST';
}

export interface SettlementError {
  outcome: 'error';
  chargeId: string;
  errorCode: ErrorCode;
  message: string;
  /** True only when nothing had been claimed or moved yet */
  retryable: boolean;
}

export type SettlementResult =
  | SettlementSucceeded
  | SettlementFailed
  | SettlementSkipped
  | SettlementError;
