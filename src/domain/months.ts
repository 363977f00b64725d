import { InvalidDateError } from './errors.js';

/**
 * Calendar helpers. Dates are `YYYY-MM-DD`, months are `YYYY-MM`.
 * All arithmetic is done in UTC so results do not depend on the host timezone.
 */

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MONTH_PATTERN = /^(\d{4})-(\d{2})(?:-(\d{2}))?$/;

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function parseIsoDate(input: string): CalendarDate {
  const match = DATE_PATTERN.exec(input.trim());
  if (!match) {
    throw new InvalidDateError(input);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    throw new InvalidDateError(input);
  }
  return { year, month, day };
}

/**
 * Normalize `YYYY-MM` or `YYYY-MM-DD` to `YYYY-MM`
 */
export function toMonthKey(input: string): string {
  const match = MONTH_PATTERN.exec(input.trim());
  if (!match) {
    throw new InvalidDateError(input, 'YYYY-MM');
  }
  const month = Number(match[2]);
  if (month < 1 || month > 12) {
    throw new InvalidDateError(input, 'YYYY-MM');
  }
  if (match[3] !== undefined) {
    parseIsoDate(input);
  }
  return `${match[1]}-${match[2]}`;
}

export function monthParts(monthKey: string): { year: number; month: number } {
  const key = toMonthKey(monthKey);
  return { year: Number(key.slice(0, 4)), month: Number(key.slice(5, 7)) };
}

export function shiftMonth(monthKey: string, offset: number): string {
  const { year, month } = monthParts(monthKey);
  const shifted = new Date(Date.UTC(year, month - 1 + offset, 1));
  return `${shifted.getUTCFullYear()}-${String(shifted.getUTCMonth() + 1).padStart(2, '0')}`;
}

export function monthOfDate(date: string): string {
  return date.slice(0, 7);
}

/**
 * Today's date (UTC) as `YYYY-MM-DD`
 */
export function isoDate(now: Date): string {
  return now.toISOString().slice(0, 10);
}
