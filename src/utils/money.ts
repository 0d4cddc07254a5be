/**
 * Money helpers
 *
 * Amounts are decimal major units. Every balance computation goes through
 * these helpers so values stay on whole cents.
 */

/**
 * Round to two decimal places (cents)
 */
export const roundMoney = (value: number): number => Math.round(value * 100) / 100;

/**
 * Convert a major-unit amount to integer minor units
 */
export const toMinorUnits = (value: number): number => Math.round(value * 100);

export const fromMinorUnits = (minor: number): number => minor / 100;

export const addMoney = (a: number, b: number): number =>
  fromMinorUnits(toMinorUnits(a) + toMinorUnits(b));

export const subtractMoney = (a: number, b: number): number =>
  fromMinorUnits(toMinorUnits(a) - toMinorUnits(b));

/**
 * Sum a list of amounts without accumulating float drift
 */
export const sumMoney = (values: number[]): number =>
  fromMinorUnits(values.reduce((acc, value) => acc + toMinorUnits(value), 0));

/**
 * True when a and b differ by at most `toleranceMinor` cents
 */
export const withinTolerance = (a: number, b: number, toleranceMinor = 1): boolean =>
  Math.abs(Math.round(a * 100) - Math.round(b * 100)) <= toleranceMinor;
