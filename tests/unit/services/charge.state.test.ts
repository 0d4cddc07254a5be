import {
  getSourceStates,
  isTerminalState,
  isValidTransition,
  validateTransition,
} from '../../../src/services/charge';
import { ChargeStatus } from '../../../src/types/events';
import { ErrorCode } from '../../../src/types/errors';

describe('charge state machine', () => {
  it('allows the settlement path', () => {
    expect(isValidTransition(ChargeStatus.PENDING, ChargeStatus.PROCESSING)).toBe(true);
    expect(isValidTransition(ChargeStatus.PROCESSING, ChargeStatus.SUCCEEDED)).toBe(true);
    expect(isValidTransition(ChargeStatus.PROCESSING, ChargeStatus.FAILED)).toBe(true);
    expect(isValidTransition(ChargeStatus.PENDING, ChargeStatus.FAILED)).toBe(true);
  });

  it('rejects skipping the claim or leaving a terminal state', () => {
    expect(isValidTransition(ChargeStatus.PENDING, ChargeStatus.SUCCEEDED)).toBe(false);
    expect(isValidTransition(ChargeStatus.SUCCEEDED, ChargeStatus.FAILED)).toBe(false);
    expect(isValidTransition(ChargeStatus.FAILED, ChargeStatus.PENDING)).toBe(false);
  });

  it('marks succeeded and failed as terminal', () => {
    expect(isTerminalState(ChargeStatus.SUCCEEDED)).toBe(true);
    expect(isTerminalState(ChargeStatus.FAILED)).toBe(true);
    expect(isTerminalState(ChargeStatus.PROCESSING)).toBe(false);
  });

  it('lists the states a target is reachable from', () => {
    expect(getSourceStates(ChargeStatus.FAILED)).toEqual([ChargeStatus.PENDING, ChargeStatus.PROCESSING]);
    expect(getSourceStates(ChargeStatus.PROCESSING)).toEqual([ChargeStatus.PENDING]);
    expect(getSourceStates(ChargeStatus.PENDING)).toEqual([]);
  });

  it('throws an invalid transition error', () => {
    expect(() => validateTransition(ChargeStatus.SUCCEEDED, ChargeStatus.FAILED, 'chg_1')).toThrow(
      expect.objectContaining({ errorCode: ErrorCode.INVALID_STATE_TRANSITION })
    );
  });
});
