import { describe, it, expect } from 'vitest';
import { AnalysisService } from '../../../src/services/AnalysisService.ts';
import { BudgetService } from '../../../src/services/BudgetService.ts';
import { Categorizer } from '../../../src/services/Categorizer.ts';
import { EntityResolver } from '../../../src/services/EntityResolver.ts';
import { SnapshotCache } from '../../../src/services/SnapshotCache.ts';
import { AmbiguousError } from '../../../src/domain/errors.ts';
import {
  account,
  category,
  group,
  GROUP_ID,
  month,
  monthEntry,
  transaction,
} from '../../support/builders.ts';
import { InMemoryBudgetProvider } from '../../support/InMemoryBudgetProvider.ts';

function setup(options: { trendMonths?: number; anomalyMultiplier?: number } = {}) {
  const clock = () => new Date('2024-06-10T09:00:00.000Z');
  const provider = new InMemoryBudgetProvider({
    accounts: [account('acct-checking', 'Checking')],
    categoryGroups: [group(GROUP_ID, 'Everyday')],
    categories: [
      category('cat-groceries', 'Groceries'),
      category('cat-dining', 'Dining'),
      category('cat-dining-in', 'Dining In'),
    ],
    transactions: [
      transaction('t-1', { date: '2024-06-02', amount: -12000, categoryId: 'cat-groceries' }),
      transaction('t-2', { date: '2024-06-08', amount: -18000, categoryId: 'cat-groceries' }),
      transaction('t-3', { date: '2024-06-09', amount: -4000 }),
    ],
    months: [
      month('2024-03', [monthEntry('cat-dining', 0, -10000)]),
      month('2024-04', [monthEntry('cat-dining', 0, -10000)]),
      month('2024-05', [monthEntry('cat-dining', 0, -10000), monthEntry('cat-groceries', 60000, -55000)]),
      month('2024-06', [monthEntry('cat-groceries', 60000, -30000), monthEntry('cat-dining', 10000, -16000)]),
    ],
  });
  const cache = new SnapshotCache(provider, { budgetId: 'budget-1', clock });
  const budgetService = new BudgetService(cache, provider, new EntityResolver(), new Categorizer({ clock }), {
    budgetId: 'budget-1',
    maxStalenessMs: 300_000,
    clock,
  });
  return new AnalysisService(budgetService, { ...options, clock });
}

describe('AnalysisService', () => {
  it('defaults to the current month', async () => {
    const analysis = setup();

    const report = await analysis.overspending();

    expect(report.month).toBe('2024-06');
    expect(report.overspent.map((c) => [c.categoryId, c.deficit])).toEqual([['cat-dining', 6000]]);
    expect(report.suggestions).toEqual([
      {
        fromCategoryId: 'cat-groceries',
        fromCategory: 'Groceries',
        toCategoryId: 'cat-dining',
        toCategory: 'Dining',
        amount: 6000,
      },
    ]);
  });

  it('applies the configured trend policy', async () => {
    const relaxed = await setup().trends('2024-06');
    expect(relaxed.multiplier).toBe(1.5);
    expect(relaxed.anomalies.map((c) => c.categoryId)).toEqual(['cat-groceries', 'cat-dining']);

    const tight = await setup({ trendMonths: 1, anomalyMultiplier: 2 }).trends('2024-06');
    expect(tight.trailingMonths).toEqual(['2024-05']);
    expect(tight.anomalies).toEqual([]);
  });

  it('forecasts a category by name as of today', async () => {
    const forecast = await setup().forecast('groceries');

    expect(forecast).toMatchObject({
      categoryId: 'cat-groceries',
      categoryName: 'Groceries',
      month: '2024-06',
      asOf: '2024-06-10',
      spentSoFar: 30000,
      daysElapsed: 10,
      projectedTotal: 90000,
      willStayInBudget: false,
    });
  });

  it('checks affordability by category name', async () => {
    const result = await setup().affordability('Groceries', 25000);

    expect(result).toMatchObject({
      categoryName: 'Groceries',
      month: '2024-06',
      available: 35000,
      remainingAfter: 10000,
      canAfford: true,
    });
  });

  it('surfaces ambiguous category names', async () => {
    await expect(setup().affordability('din', 1000)).rejects.toBeInstanceOf(AmbiguousError);
  });

  it('lists uncategorized transactions', async () => {
    const review = await setup().uncategorized();
    expect(review.map((item) => item.transaction.id)).toEqual(['t-3']);
  });
});
