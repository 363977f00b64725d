import { checkAffordability, type AffordabilityResult } from '../domain/analyzers/affordability.js';
import { analyzeCreditCards, type CreditCardReport } from '../domain/analyzers/creditCards.js';
import { forecastSpending, type SpendingForecast } from '../domain/analyzers/forecast.js';
import { detectOverspending, type OverspendingReport } from '../domain/analyzers/overspending.js';
import {
  detectTrends,
  TREND_DEFAULTS,
  type TrendOptions,
  type TrendReport,
} from '../domain/analyzers/trends.js';
import type { UncategorizedFilter } from '../domain/analyzers/uncategorized.js';
import { isoDate, monthOfDate, toMonthKey } from '../domain/months.js';
import type { BudgetService, UncategorizedReviewItem } from './BudgetService.js';

export interface AnalysisServiceOptions {
  trendMonths?: number;
  anomalyMultiplier?: number;
  clock?: () => Date;
}

/**
 * AnalysisService - resolves names, picks the month and runs the analyzers
 * on one snapshot with the configured policy constants.
 */
export class AnalysisService {
  private readonly trendMonths: number;
  private readonly anomalyMultiplier: number;
  private readonly clock: () => Date;

  constructor(
    private readonly budgetService: BudgetService,
    options: AnalysisServiceOptions = {}
  ) {
    this.trendMonths = options.trendMonths ?? TREND_DEFAULTS.MONTHS;
    this.anomalyMultiplier = options.anomalyMultiplier ?? TREND_DEFAULTS.ANOMALY_MULTIPLIER;
    this.clock = options.clock ?? (() => new Date());
  }

  async overspending(month?: string): Promise<OverspendingReport> {
    const key = this.monthOrCurrent(month);
    const snapshot = await this.budgetService.getSnapshot();
    return detectOverspending(snapshot, key);
  }

  async trends(month?: string, options: TrendOptions = {}): Promise<TrendReport> {
    const key = this.monthOrCurrent(month);
    const snapshot = await this.budgetService.getSnapshot();
    return detectTrends(snapshot, key, {
      months: options.months ?? this.trendMonths,
      multiplier: options.multiplier ?? this.anomalyMultiplier,
    });
  }

  async forecast(
    category: string,
    month?: string,
    asOf?: string
  ): Promise<SpendingForecast & { categoryName: string }> {
    const today = asOf ?? isoDate(this.clock());
    const key = month ? toMonthKey(month) : monthOfDate(today);

    return this.budgetService.withSnapshot((snapshot) => {
      const categoryId = this.budgetService.resolveId(snapshot, 'category', category);
      const forecast = forecastSpending(snapshot, categoryId, key, today);
      return { ...forecast, categoryName: snapshot.categories.get(categoryId)?.name ?? categoryId };
    });
  }

  async affordability(
    category: string,
    amount: number,
    month?: string
  ): Promise<AffordabilityResult & { categoryName: string }> {
    const key = this.monthOrCurrent(month);

    return this.budgetService.withSnapshot((snapshot) => {
      const categoryId = this.budgetService.resolveId(snapshot, 'category', category);
      const result = checkAffordability(snapshot, categoryId, key, amount);
      return { ...result, categoryName: snapshot.categories.get(categoryId)?.name ?? categoryId };
    });
  }

  async creditCards(month?: string): Promise<CreditCardReport> {
    const key = this.monthOrCurrent(month);
    return analyzeCreditCards(await this.budgetService.getSnapshot(), key);
  }

  async uncategorized(filter: UncategorizedFilter = {}): Promise<UncategorizedReviewItem[]> {
    return this.budgetService.reviewUncategorized(filter);
  }

  private monthOrCurrent(month: string | undefined): string {
    return month ? toMonthKey(month) : monthOfDate(isoDate(this.clock()));
  }
}
