import { InvalidAmountError } from './errors.js';

/**
 * Money helpers. All amounts inside the core are integer milliunits
 * (1000 milliunits = one currency unit). These are the only conversions
 * between display amounts and milliunits.
 */

export const MILLIUNITS_PER_UNIT = 1000;

/**
 * Half of the smallest denomination (one cent = 10 milliunits).
 * Used for equality and sign checks, never for magnitudes.
 */
export const MILLIUNIT_EPSILON = 5;

/**
 * Currency units to milliunits. Results beyond Number.MAX_SAFE_INTEGER
 * cannot be represented exactly and are rejected.
 */
export function toMilliunits(amount: number): number {
  if (!Number.isFinite(amount)) {
    throw new InvalidAmountError(amount);
  }
  const milliunits = Math.round(amount * MILLIUNITS_PER_UNIT);
  if (!Number.isSafeInteger(milliunits)) {
    throw new InvalidAmountError(amount);
  }
  return milliunits;
}

export function fromMilliunits(milliunits: number): number {
  if (!Number.isInteger(milliunits)) {
    throw new InvalidAmountError(milliunits);
  }
  return milliunits / MILLIUNITS_PER_UNIT;
}

export function amountsEqual(a: number, b: number, epsilon: number = MILLIUNIT_EPSILON): boolean {
  return Math.abs(a - b) <= epsilon;
}

export function isNegative(milliunits: number, epsilon: number = MILLIUNIT_EPSILON): boolean {
  return milliunits < -epsilon;
}

export function isPositive(milliunits: number, epsilon: number = MILLIUNIT_EPSILON): boolean {
  return milliunits > epsilon;
}

const DISPLAY_AMOUNT_PATTERN = /^([+-])?\s*[$€£]?\s*(\d{1,3}(,\d{3})+|\d+)?(\.\d+)?$/;

/**
 * Parse a display amount such as "12.50", "-$1,234.56" or a plain number
 * and return milliunits.
 */
export function parseDisplayAmount(input: string | number): number {
  if (typeof input === 'number') {
    return toMilliunits(input);
  }

  const trimmed = input.trim();
  const match = DISPLAY_AMOUNT_PATTERN.exec(trimmed);
  if (!match || (!match[2] && !match[4])) {
    throw new InvalidAmountError(input);
  }

  const sign = match[1] === '-' ? -1 : 1;
  const whole = (match[2] ?? '0').replace(/,/g, '');
  const value = Number(`${whole}${match[4] ?? ''}`);
  return toMilliunits(sign * value);
}
