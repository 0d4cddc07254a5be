import { ChargeStatus } from '../../types/events';
import { ApiError } from '../../middlewares/errorHandler';

/**
 * Valid state transitions for a Charge
 *
 * State Machine:
 * PENDING ────► PROCESSING ────► SUCCEEDED
 *    │               │
 *    │               ▼
 *    └────────────► FAILED
 *
 * PROCESSING is the settlement claim; SUCCEEDED and FAILED are terminal.
 */
const validTransitions: Record<ChargeStatus, ChargeStatus[]> = {
  [ChargeStatus.PENDING]: [ChargeStatus.PROCESSING, ChargeStatus.FAILED],
  [ChargeStatus.PROCESSING]: [ChargeStatus.SUCCEEDED, ChargeStatus.FAILED],
  [ChargeStatus.SUCCEEDED]: [], // Terminal state
  [ChargeStatus.FAILED]: [], // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(currentStatus: ChargeStatus, newStatus: ChargeStatus): boolean {
  return validTransitions[currentStatus].includes(newStatus);
}

/**
 * Throws ApiError if the transition is invalid
 */
export function validateTransition(
  currentStatus: ChargeStatus,
  newStatus: ChargeStatus,
  chargeId: string
): void {
  if (!isValidTransition(currentStatus, newStatus)) {
    throw ApiError.invalidTransition(`charge ${chargeId}`, currentStatus, newStatus);
  }
}

/**
 * Check if a charge is in a terminal state
 */
export function isTerminalState(status: ChargeStatus): boolean {
  return validTransitions[status].length === 0;
}

/**
 * States a charge may be in for `target` to be reachable in one step.
 * Used as the precondition of a conditional update.
 */
export function getSourceStates(target: ChargeStatus): ChargeStatus[] {
  return Object.values(ChargeStatus).filter((status) =>
    validTransitions[status].includes(target)
  );
}
