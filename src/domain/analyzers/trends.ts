import { listCategories, type BudgetSnapshot } from '../entities/BudgetSnapshot.js';
import { shiftMonth, toMonthKey } from '../months.js';

export const TREND_DEFAULTS = {
  MONTHS: 3,
  ANOMALY_MULTIPLIER: 1.5,
} as const;

export interface TrendOptions {
  months?: number;
  multiplier?: number;
}

export interface CategoryTrend {
  categoryId: string;
  name: string;
  /** spend per trailing month, oldest first, milliunits */
  trailing: number[];
  average: number;
  current: number;
  anomalous: boolean;
  irregular: boolean;
  /** null when the average is zero */
  pctAboveAverage: number | null;
}

export interface TrendReport {
  month: string;
  trailingMonths: string[];
  multiplier: number;
  categories: CategoryTrend[];
  anomalies: CategoryTrend[];
}

/**
 * Spend is the outflow part of a month's activity
 */
function monthlySpend(snapshot: BudgetSnapshot, month: string, categoryId: string): number {
  const activity = snapshot.months.get(month)?.categories.get(categoryId)?.activity ?? 0;
  return activity < 0 ? -activity : 0;
}

/**
 * Compare each category's spend in `month` with its average over the
 * preceding months. The reference month itself never enters the average.
 */
export function detectTrends(
  snapshot: BudgetSnapshot,
  month: string,
  options: TrendOptions = {}
): TrendReport {
  const key = toMonthKey(month);
  const count = options.months ?? TREND_DEFAULTS.MONTHS;
  const multiplier = options.multiplier ?? TREND_DEFAULTS.ANOMALY_MULTIPLIER;
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`Trend window must be a positive integer, got ${count}`);
  }

  const trailingMonths: string[] = [];
  for (let offset = count; offset >= 1; offset--) {
    trailingMonths.push(shiftMonth(key, -offset));
  }

  const categories: CategoryTrend[] = [];
  for (const category of listCategories(snapshot)) {
    const trailing = trailingMonths.map((m) => monthlySpend(snapshot, m, category.id));
    const current = monthlySpend(snapshot, key, category.id);
    if (current === 0 && trailing.every((v) => v === 0)) {
      continue;
    }

    const average = trailing.reduce((sum, v) => sum + v, 0) / trailing.length;
    const zeroMonths = trailing.filter((v) => v === 0).length;

    categories.push({
      categoryId: category.id,
      name: category.name,
      trailing,
      average,
      current,
      anomalous: average > 0 && current > multiplier * average,
      irregular: zeroMonths > 0 && zeroMonths < trailing.length,
      pctAboveAverage: average > 0 ? ((current - average) / average) * 100 : null,
    });
  }

  categories.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const anomalies = categories
    .filter((c) => c.anomalous)
    .sort((a, b) => (b.pctAboveAverage ?? 0) - (a.pctAboveAverage ?? 0));

  return { month: key, trailingMonths, multiplier, categories, anomalies };
}
