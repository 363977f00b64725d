import { categorizedLines, type BudgetSnapshot } from '../entities/BudgetSnapshot.js';
import { ValidationError } from '../errors.js';
import { MILLIUNIT_EPSILON } from '../money.js';
import { daysInMonth, monthParts, parseIsoDate, toMonthKey } from '../months.js';

export interface SpendingForecast {
  categoryId: string;
  month: string;
  asOf: string;
  budgeted: number;
  spentSoFar: number;
  daysElapsed: number;
  daysInMonth: number;
  dailyRate: number;
  projectedTotal: number;
  projectedRemaining: number;
  willStayInBudget: boolean;
}

/**
 * Linear run-rate projection of a category's outflow to the end of `month`.
 * `asOf` after the month means the month is complete.
 */
export function forecastSpending(
  snapshot: BudgetSnapshot,
  categoryId: string,
  month: string,
  asOf: string
): SpendingForecast {
  const key = toMonthKey(month);
  const { year, month: monthNumber } = monthParts(key);
  const totalDays = daysInMonth(year, monthNumber);

  const today = parseIsoDate(asOf);
  const asOfMonth = `${today.year}-${String(today.month).padStart(2, '0')}`;
  if (asOfMonth < key) {
    throw new ValidationError(`Cannot forecast ${key} as of ${asOf}: the month has not started`, {
      month: key,
      asOf,
    });
  }
  const daysElapsed = asOfMonth === key ? today.day : totalDays;
  const lastCountedDate = `${key}-${String(daysElapsed).padStart(2, '0')}`;

  let spentSoFar = 0;
  for (const line of categorizedLines(snapshot)) {
    if (
      line.categoryId === categoryId &&
      line.amount < 0 &&
      line.date.startsWith(key) &&
      line.date <= lastCountedDate
    ) {
      spentSoFar -= line.amount;
    }
  }

  const budgeted = snapshot.months.get(key)?.categories.get(categoryId)?.budgeted ?? 0;
  const dailyRate = spentSoFar / daysElapsed;
  const projectedTotal = Math.round(dailyRate * totalDays);

  return {
    categoryId,
    month: key,
    asOf,
    budgeted,
    spentSoFar,
    daysElapsed,
    daysInMonth: totalDays,
    dailyRate: Math.round(dailyRate),
    projectedTotal,
    projectedRemaining: budgeted - projectedTotal,
    willStayInBudget: projectedTotal <= budgeted + MILLIUNIT_EPSILON,
  };
}
