import Decimal from 'decimal.js';

// Configure Decimal.js globally for ledger precision
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,
  toExpNeg: -9e15,
});

export const ZERO = new Decimal(0);

/**
 * Converts any number-like value to Decimal.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Converts Decimal back to a JavaScript number for the service boundary.
 * Rounds to 8 decimal places so fractional share counts survive intact.
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/** Rounds a plain number to 2 decimal places (currency display). */
export function toMoney(value: number): number {
  return new Decimal(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
}

// Engine paths never raise on degenerate arithmetic: zero divisor yields zero.
export function safeDivide(a: Decimal, b: Decimal): Decimal {
  return b.isZero() ? ZERO : a.dividedBy(b);
}
