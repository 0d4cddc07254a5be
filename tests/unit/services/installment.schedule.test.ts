import {
  buildInstallmentSchedule,
  dueDateFor,
  validateScheduleInput,
} from '../../../src/services/installment';
import { ErrorCode } from '../../../src/types/errors';

const DAY_MS = 24 * 60 * 60 * 1000;
const start = new Date('2026-01-01T00:00:00.000Z');

describe('installment schedule', () => {
  describe('buildInstallmentSchedule', () => {
    it('splits 1000 into ten installments of 100 due every 30 days', () => {
      const schedule = buildInstallmentSchedule({
        totalAmount: 1000,
        installmentCount: 10,
        startDate: start,
      });

      expect(schedule.installmentAmount).toBe(100);
      expect(schedule.installments).toHaveLength(10);
      expect(schedule.installments.map((i) => i.amount)).toEqual(Array(10).fill(100));
      expect(schedule.installments.map((i) => i.sequenceNumber)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
      expect(schedule.installments.map((i) => (i.dueDate.getTime() - start.getTime()) / DAY_MS)).toEqual([
        30, 60, 90, 120, 150, 180, 210, 240, 270, 300,
      ]);
    });

    it('puts the rounding remainder on the last installment', () => {
      const schedule = buildInstallmentSchedule({
        totalAmount: 100,
        installmentCount: 3,
        startDate: start,
      });

      expect(schedule.installments.map((i) => i.amount)).toEqual([33.33, 33.33, 33.34]);
    });

    it('accepts a supplied amount within one cent of the total', () => {
      const schedule = buildInstallmentSchedule({
        totalAmount: 100,
        installmentCount: 3,
        installmentAmount: 33.33,
        startDate: start,
      });

      expect(schedule.installmentAmount).toBe(33.33);
      expect(schedule.installments.map((i) => i.amount)).toEqual([33.33, 33.33, 33.34]);
    });

    it('rejects a schedule whose last installment would be empty', () => {
      expect(() =>
        buildInstallmentSchedule({
          totalAmount: 0.01,
          installmentCount: 2,
          installmentAmount: 0.01,
          startDate: start,
        })
      ).toThrow(expect.objectContaining({ errorCode: ErrorCode.INSTALLMENT_AMOUNT_MISMATCH }));
    });
  });

  describe('validateScheduleInput', () => {
    it('derives the per-installment amount when none is given', () => {
      expect(validateScheduleInput({ totalAmount: 1000, installmentCount: 4 })).toBe(250);
    });

    it('rejects an amount that does not multiply out to the total', () => {
      expect(() =>
        validateScheduleInput({ totalAmount: 100, installmentCount: 3, installmentAmount: 30 })
      ).toThrow(expect.objectContaining({ errorCode: ErrorCode.INSTALLMENT_AMOUNT_MISMATCH, statusCode: 400 }));
    });

    it('accepts a one-cent rounding gap and nothing wider', () => {
      expect(
        validateScheduleInput({ totalAmount: 100, installmentCount: 3, installmentAmount: 33.33 })
      ).toBe(33.33);
      expect(() =>
        validateScheduleInput({ totalAmount: 100, installmentCount: 3, installmentAmount: 33.32 })
      ).toThrow(expect.objectContaining({ errorCode: ErrorCode.INSTALLMENT_AMOUNT_MISMATCH }));
    });

    it.each([0, 25, 1.5])('rejects an installment count of %p', (installmentCount) => {
      expect(() => validateScheduleInput({ totalAmount: 100, installmentCount })).toThrow(
        expect.objectContaining({ errorCode: ErrorCode.VALIDATION_ERROR })
      );
    });

    it('rejects a non-positive total', () => {
      expect(() => validateScheduleInput({ totalAmount: 0, installmentCount: 2 })).toThrow(
        expect.objectContaining({ errorCode: ErrorCode.VALIDATION_ERROR })
      );
    });
  });

  it('computes due dates from the start date', () => {
    expect(dueDateFor(start, 2).toISOString()).toBe('2026-03-02T00:00:00.000Z');
  });
});
