import { describe, it, expect } from 'vitest';
import {
  daysInMonth,
  isoDate,
  parseIsoDate,
  shiftMonth,
  toMonthKey,
} from '../../../src/domain/months.ts';
import { InvalidDateError } from '../../../src/domain/errors.ts';

describe('months', () => {
  it('counts days per month including leap years', () => {
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(2024, 4)).toBe(30);
    expect(daysInMonth(2024, 12)).toBe(31);
  });

  it('parses valid ISO dates and rejects impossible ones', () => {
    expect(parseIsoDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
    expect(() => parseIsoDate('2023-02-29')).toThrow(InvalidDateError);
    expect(() => parseIsoDate('2024-13-01')).toThrow(InvalidDateError);
    expect(() => parseIsoDate('06/15/2024')).toThrow(InvalidDateError);
  });

  it('normalizes month keys', () => {
    expect(toMonthKey('2024-06')).toBe('2024-06');
    expect(toMonthKey('2024-06-01')).toBe('2024-06');
    expect(() => toMonthKey('2024-00')).toThrow(InvalidDateError);
    expect(() => toMonthKey('2024-06-31')).toThrow(InvalidDateError);
  });

  it('shifts months across year boundaries', () => {
    expect(shiftMonth('2024-01', -1)).toBe('2023-12');
    expect(shiftMonth('2023-11', 3)).toBe('2024-02');
    expect(shiftMonth('2024-06', 0)).toBe('2024-06');
  });

  it('formats today in UTC', () => {
    expect(isoDate(new Date('2024-06-15T23:30:00.000Z'))).toBe('2024-06-15');
  });
});
