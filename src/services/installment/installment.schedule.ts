/**
 * Installment schedule arithmetic
 *
 * Pure functions: no I/O, no clock.
 */

import { ApiError } from '../../middlewares/errorHandler';
import { NewInstallment } from '../../stores/installment.store';
import { roundMoney, subtractMoney, toMinorUnits, withinTolerance } from '../../utils/money';

export const MIN_INSTALLMENTS = 1;
export const MAX_INSTALLMENTS = 24;
export const INSTALLMENT_INTERVAL_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ScheduleInput {
  totalAmount: number;
  installmentCount: number;
  installmentAmount?: number;
  startDate: Date;
}

export interface InstallmentSchedule {
  /** Per-installment amount as recorded on the order */
  installmentAmount: number;
  installments: NewInstallment[];
}

/**
 * Validate order amounts. Throws before anything is written.
 */
export function validateScheduleInput(input: Omit<ScheduleInput, 'startDate'>): number {
  const { totalAmount, installmentCount, installmentAmount } = input;

  if (
    !Number.isInteger(installmentCount) ||
    installmentCount < MIN_INSTALLMENTS ||
    installmentCount > MAX_INSTALLMENTS
  ) {
    throw ApiError.validationError(
      `Installment count must be an integer between ${MIN_INSTALLMENTS} and ${MAX_INSTALLMENTS}`,
      { installmentCount: ['out of range'] }
    );
  }

  if (!(toMinorUnits(totalAmount) > 0)) {
    throw ApiError.validationError('Total amount must be positive', {
      totalAmount: ['must be greater than 0'],
    });
  }

  if (installmentAmount === undefined) {
    return totalAmount / installmentCount;
  }

  if (!(toMinorUnits(installmentAmount) > 0)) {
    throw ApiError.validationError('Installment amount must be positive', {
      installmentAmount: ['must be greater than 0'],
    });
  }

  // One cent of tolerance
  if (!withinTolerance(installmentAmount * installmentCount, totalAmount)) {
    throw ApiError.amountMismatch(
      `Installment amount ${installmentAmount} x ${installmentCount} does not match total amount ${totalAmount}`
    );
  }

  return installmentAmount;
}

export function dueDateFor(startDate: Date, sequenceNumber: number): Date {
  return new Date(startDate.getTime() + INSTALLMENT_INTERVAL_DAYS * sequenceNumber * DAY_MS);
}

/**
 * Build the installment rows for an order. Each installment is the per-installment
 * amount rounded to cents; the last one absorbs the remainder so the rows sum to
 * the total exactly.
 */
export function buildInstallmentSchedule(input: ScheduleInput): InstallmentSchedule {
  const installmentAmount = validateScheduleInput(input);
  const regular = roundMoney(installmentAmount);
  const count = input.installmentCount;

  const last = subtractMoney(input.totalAmount, roundMoney(regular * (count - 1)));
  if (toMinorUnits(last) <= 0) {
    throw ApiError.amountMismatch(
      `Installment amount ${installmentAmount} leaves nothing for the final installment`
    );
  }

  const installments: NewInstallment[] = [];
  for (let sequenceNumber = 1; sequenceNumber <= count; sequenceNumber += 1) {
    installments.push({
      sequenceNumber,
      amount: sequenceNumber === count ? last : regular,
      dueDate: dueDateFor(input.startDate, sequenceNumber),
    });
  }

  return { installmentAmount, installments };
}
