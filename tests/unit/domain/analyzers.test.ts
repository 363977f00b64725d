import { describe, it, expect } from 'vitest';
import { detectOverspending, runningBalance } from '../../../src/domain/analyzers/overspending.ts';
import { detectTrends } from '../../../src/domain/analyzers/trends.ts';
import { forecastSpending } from '../../../src/domain/analyzers/forecast.ts';
import { checkAffordability } from '../../../src/domain/analyzers/affordability.ts';
import { findUncategorizedTransactions } from '../../../src/domain/analyzers/uncategorized.ts';
import { searchTransactions } from '../../../src/domain/analyzers/search.ts';
import { analyzeCreditCards } from '../../../src/domain/analyzers/creditCards.ts';
import { computeBudgetAssignments } from '../../../src/domain/analyzers/budgetSetup.ts';
import { InvalidAmountError, ValidationError } from '../../../src/domain/errors.ts';
import {
  account,
  buildSnapshot,
  category,
  group,
  GROUP_ID,
  month,
  monthEntry,
  payee,
  split,
  transaction,
} from '../../support/builders.ts';

describe('detectOverspending', () => {
  const snapshot = buildSnapshot({
    categories: [
      category('cat-groceries', 'Groceries'),
      category('cat-rent', 'Rent'),
      category('cat-dining', 'Dining'),
      category('cat-fun', 'Fun'),
      category('cat-car', 'Car'),
      category('cat-hidden', 'Hidden', { hidden: true }),
    ],
    months: [
      month('2024-05', [monthEntry('cat-fun', 3000, 0), monthEntry('cat-car', 0, -4000)]),
      month('2024-06', [
        monthEntry('cat-groceries', 60000, -72000),
        monthEntry('cat-rent', 150000, -150000),
        monthEntry('cat-dining', 50000, -10000),
        monthEntry('cat-fun', 20000, -15000),
        monthEntry('cat-car', 1000, -1500),
        monthEntry('cat-hidden', 0, -9000),
      ]),
    ],
  });

  it('reports deficits largest first and leaves fully spent categories out', () => {
    const report = detectOverspending(snapshot, '2024-06');

    expect(report.month).toBe('2024-06');
    expect(report.overspent.map((c) => [c.name, c.deficit])).toEqual([
      ['Groceries', 12000],
      ['Car', 500],
    ]);
    expect(report.totalDeficit).toBe(12500);
  });

  it('carries positive balances forward but not negative ones', () => {
    expect(runningBalance(snapshot, '2024-06', 'cat-fun').balance).toBe(8000);
    expect(runningBalance(snapshot, '2024-06', 'cat-car').balance).toBe(-500);
  });

  it('suggests moves from the richest sources', () => {
    const report = detectOverspending(snapshot, '2024-06-01');

    expect(report.sources.map((s) => [s.name, s.balance])).toEqual([
      ['Dining', 40000],
      ['Fun', 8000],
    ]);
    expect(report.suggestions).toEqual([
      {
        fromCategoryId: 'cat-dining',
        fromCategory: 'Dining',
        toCategoryId: 'cat-groceries',
        toCategory: 'Groceries',
        amount: 12000,
      },
      {
        fromCategoryId: 'cat-dining',
        fromCategory: 'Dining',
        toCategoryId: 'cat-car',
        toCategory: 'Car',
        amount: 500,
      },
    ]);
  });

  it('splits a deficit across sources when one is not enough', () => {
    const tight = buildSnapshot({
      categories: [category('cat-a', 'A'), category('cat-b', 'B'), category('cat-c', 'C')],
      months: [
        month('2024-06', [
          monthEntry('cat-a', 0, -7000),
          monthEntry('cat-b', 5000, 0),
          monthEntry('cat-c', 1000, 0),
        ]),
      ],
    });

    expect(detectOverspending(tight, '2024-06').suggestions.map((s) => [s.fromCategoryId, s.amount])).toEqual([
      ['cat-b', 5000],
      ['cat-c', 1000],
    ]);
  });

  it('ignores deficits within the rounding tolerance', () => {
    const nearlyEven = buildSnapshot({
      categories: [category('cat-a', 'A')],
      months: [month('2024-06', [monthEntry('cat-a', 1000, -1005)])],
    });

    const report = detectOverspending(nearlyEven, '2024-06');
    expect(report.overspent).toEqual([]);
    expect(report.sources).toEqual([]);
  });
});

describe('detectTrends', () => {
  const snapshot = buildSnapshot({
    categories: [
      category('cat-groceries', 'Groceries'),
      category('cat-dining', 'Dining'),
      category('cat-gifts', 'Gifts'),
      category('cat-rent', 'Rent'),
      category('cat-refunds', 'Refunds'),
    ],
    months: [
      month('2024-02', [monthEntry('cat-dining', 0, -99000)]),
      month('2024-03', [monthEntry('cat-groceries', 0, -60000), monthEntry('cat-dining', 0, -10000)]),
      month('2024-04', [monthEntry('cat-groceries', 0, -60000), monthEntry('cat-dining', 0, -10000)]),
      month('2024-05', [
        monthEntry('cat-groceries', 0, -60000),
        monthEntry('cat-dining', 0, -10000),
        monthEntry('cat-gifts', 0, -3000),
      ]),
      month('2024-06', [
        monthEntry('cat-groceries', 0, -66000),
        monthEntry('cat-dining', 0, -20000),
        monthEntry('cat-gifts', 0, -9000),
        monthEntry('cat-refunds', 0, 5000),
      ]),
    ],
  });

  it('compares the month with the preceding ones only', () => {
    const report = detectTrends(snapshot, '2024-06');

    expect(report.trailingMonths).toEqual(['2024-03', '2024-04', '2024-05']);
    expect(report.categories.map((c) => c.name)).toEqual(['Dining', 'Gifts', 'Groceries']);

    const dining = report.categories[0];
    expect(dining.trailing).toEqual([10000, 10000, 10000]);
    expect(dining.average).toBe(10000);
    expect(dining.current).toBe(20000);
    expect(dining.pctAboveAverage).toBe(100);
  });

  it('flags anomalies above the multiplier, largest jump first', () => {
    const report = detectTrends(snapshot, '2024-06');

    expect(report.anomalies.map((c) => [c.name, c.pctAboveAverage])).toEqual([
      ['Gifts', 800],
      ['Dining', 100],
    ]);
    expect(report.categories.find((c) => c.name === 'Groceries')?.anomalous).toBe(false);
  });

  it('marks categories with gaps in their history as irregular', () => {
    const report = detectTrends(snapshot, '2024-06');

    expect(report.categories.find((c) => c.name === 'Gifts')?.irregular).toBe(true);
    expect(report.categories.find((c) => c.name === 'Dining')?.irregular).toBe(false);
  });

  it('honours a custom multiplier and window', () => {
    const strict = detectTrends(snapshot, '2024-06', { multiplier: 1.05 });
    expect(strict.anomalies.map((c) => c.name)).toEqual(['Gifts', 'Dining', 'Groceries']);

    const single = detectTrends(snapshot, '2024-06', { months: 1 });
    expect(single.trailingMonths).toEqual(['2024-05']);
  });

  it('never flags a category without history', () => {
    const report = detectTrends(snapshot, '2024-03');
    const groceries = report.categories.find((c) => c.name === 'Groceries');

    expect(groceries?.average).toBe(0);
    expect(groceries?.anomalous).toBe(false);
    expect(groceries?.pctAboveAverage).toBeNull();
  });

  it('rejects an empty window', () => {
    expect(() => detectTrends(snapshot, '2024-06', { months: 0 })).toThrow(RangeError);
  });
});

describe('forecastSpending', () => {
  const snapshot = buildSnapshot({
    categories: [category('cat-groceries', 'Groceries'), category('cat-other', 'Other')],
    transactions: [
      transaction('t-1', { date: '2024-06-01', amount: -10000, categoryId: 'cat-groceries' }),
      transaction('t-2', { date: '2024-06-03', amount: 3000, categoryId: 'cat-groceries' }),
      transaction('t-3', {
        date: '2024-06-05',
        amount: -8000,
        subtransactions: [
          split('s-1', 't-3', -5000, 'cat-groceries'),
          split('s-2', 't-3', -3000, 'cat-other'),
        ],
      }),
      transaction('t-4', { date: '2024-06-10', amount: -15000, categoryId: 'cat-groceries' }),
      transaction('t-5', { date: '2024-06-20', amount: -20000, categoryId: 'cat-groceries' }),
      transaction('t-6', { date: '2024-05-31', amount: -9999, categoryId: 'cat-groceries' }),
    ],
    months: [month('2024-06', [monthEntry('cat-groceries', 60000, -47000)])],
  });

  it('projects the run rate to the end of the month', () => {
    const forecast = forecastSpending(snapshot, 'cat-groceries', '2024-06', '2024-06-10');

    expect(forecast).toEqual({
      categoryId: 'cat-groceries',
      month: '2024-06',
      asOf: '2024-06-10',
      budgeted: 60000,
      spentSoFar: 30000,
      daysElapsed: 10,
      daysInMonth: 30,
      dailyRate: 3000,
      projectedTotal: 90000,
      projectedRemaining: -30000,
      willStayInBudget: false,
    });
  });

  it('uses the whole month once it is over', () => {
    const forecast = forecastSpending(snapshot, 'cat-groceries', '2024-06', '2024-07-02');

    expect(forecast.daysElapsed).toBe(30);
    expect(forecast.spentSoFar).toBe(50000);
    expect(forecast.projectedTotal).toBe(50000);
    expect(forecast.willStayInBudget).toBe(true);
  });

  it('rejects a date before the month starts', () => {
    expect(() => forecastSpending(snapshot, 'cat-groceries', '2024-06', '2024-05-31')).toThrow(
      ValidationError
    );
  });
});

describe('checkAffordability', () => {
  const snapshot = buildSnapshot({
    categories: [category('cat-dining', 'Dining'), category('cat-empty', 'Empty')],
    months: [
      month('2024-05', [monthEntry('cat-dining', 5000, 0)]),
      month('2024-06', [monthEntry('cat-dining', 50000, -10000)]),
    ],
  });

  it('checks a purchase against the available balance', () => {
    expect(checkAffordability(snapshot, 'cat-dining', '2024-06', 30000)).toEqual({
      categoryId: 'cat-dining',
      month: '2024-06',
      requested: 30000,
      available: 45000,
      remainingAfter: 15000,
      budgeted: 50000,
      utilizationPct: 20,
      canAfford: true,
    });
  });

  it('tolerates sub-cent shortfalls', () => {
    expect(checkAffordability(snapshot, 'cat-dining', '2024-06', 45003).canAfford).toBe(true);
    expect(checkAffordability(snapshot, 'cat-dining', '2024-06', 46000).canAfford).toBe(false);
  });

  it('reports zero utilization without a budget', () => {
    const result = checkAffordability(snapshot, 'cat-empty', '2024-06', 0);
    expect(result.utilizationPct).toBe(0);
    expect(result.canAfford).toBe(true);
  });

  it('rejects negative and fractional amounts', () => {
    expect(() => checkAffordability(snapshot, 'cat-dining', '2024-06', -1)).toThrow(InvalidAmountError);
    expect(() => checkAffordability(snapshot, 'cat-dining', '2024-06', 1.5)).toThrow(InvalidAmountError);
  });
});

describe('findUncategorizedTransactions', () => {
  const snapshot = buildSnapshot({
    accounts: [account('acct-checking', 'Checking'), account('acct-savings', 'Savings')],
    categories: [category('cat-a', 'A')],
    transactions: [
      transaction('txn-0', { date: '2024-05-20', amount: -100 }),
      transaction('txn-1', { date: '2024-06-10', amount: -100 }),
      transaction('txn-2', { date: '2024-06-12', amount: -100, categoryId: 'cat-a' }),
      transaction('txn-3', { date: '2024-06-12', amount: -100, transferAccountId: 'acct-savings' }),
      transaction('txn-4', {
        date: '2024-06-12',
        amount: -300,
        subtransactions: [split('s-1', 'txn-4', -200, 'cat-a'), split('s-2', 'txn-4', -100, null)],
      }),
      transaction('txn-5', {
        date: '2024-06-01',
        amount: -300,
        subtransactions: [split('s-3', 'txn-5', -300, 'cat-a')],
      }),
      transaction('txn-6', { date: '2024-06-11', amount: -100, deleted: true }),
      transaction('txn-7', { date: '2024-06-12', amount: -100, accountId: 'acct-savings' }),
    ],
  });

  it('lists uncategorized transactions newest first', () => {
    expect(findUncategorizedTransactions(snapshot).map((t) => t.id)).toEqual([
      'txn-4',
      'txn-7',
      'txn-1',
      'txn-0',
    ]);
  });

  it('filters by account and start date', () => {
    expect(findUncategorizedTransactions(snapshot, { accountId: 'acct-savings' }).map((t) => t.id)).toEqual([
      'txn-7',
    ]);
    expect(findUncategorizedTransactions(snapshot, { sinceDate: '2024-06-10' }).map((t) => t.id)).toEqual([
      'txn-4',
      'txn-7',
      'txn-1',
    ]);
  });
});

describe('searchTransactions', () => {
  const snapshot = buildSnapshot({
    accounts: [account('acct-checking', 'Checking'), account('acct-visa', 'Visa', { type: 'creditCard' })],
    categories: [category('cat-groceries', 'Groceries'), category('cat-household', 'Household')],
    payees: [payee('payee-heb', 'HEB #42'), payee('payee-target', 'Target')],
    transactions: [
      transaction('t-1', {
        date: '2024-06-01',
        amount: -5000,
        payeeId: 'payee-heb',
        categoryId: 'cat-groceries',
        memo: 'Weekly shop',
      }),
      transaction('t-2', {
        date: '2024-06-03',
        amount: -25000,
        payeeId: 'payee-target',
        accountId: 'acct-visa',
        subtransactions: [
          split('s-1', 't-2', -20000, 'cat-household'),
          split('s-2', 't-2', -5000, 'cat-groceries'),
        ],
      }),
      transaction('t-3', { date: '2024-06-05', amount: 120000, memo: 'Paycheck' }),
      transaction('t-4', { date: '2024-06-07', amount: -800, payeeId: 'payee-heb' }),
      transaction('t-5', {
        date: '2024-06-08',
        amount: -9000,
        payeeId: 'payee-heb',
        categoryId: 'cat-groceries',
        deleted: true,
      }),
    ],
  });

  const ids = (search: Parameters<typeof searchTransactions>[1]) =>
    searchTransactions(snapshot, search).map((match) => match.transaction.id);

  it('lists live transactions newest first with their names', () => {
    const matches = searchTransactions(snapshot);

    expect(matches.map((match) => match.transaction.id)).toEqual(['t-4', 't-3', 't-2', 't-1']);
    expect(matches[3]).toMatchObject({
      accountName: 'Checking',
      payeeName: 'HEB #42',
      categoryNames: ['Groceries'],
    });
    expect(matches[2]?.categoryNames).toEqual(['Household', 'Groceries']);
    expect(matches[1]?.payeeName).toBeNull();
  });

  it('matches text criteria case-insensitively', () => {
    expect(ids({ payee: 'heb' })).toEqual(['t-4', 't-1']);
    expect(ids({ memo: 'WEEKLY' })).toEqual(['t-1']);
    expect(ids({ account: 'visa' })).toEqual(['t-2']);
    expect(ids({ category: 'groceries' })).toEqual(['t-2', 't-1']);
  });

  it('compares absolute amounts and inclusive dates', () => {
    expect(ids({ minAmount: 5000, maxAmount: 25000 })).toEqual(['t-2', 't-1']);
    expect(ids({ sinceDate: '2024-06-03', untilDate: '2024-06-05' })).toEqual(['t-3', 't-2']);
  });

  it('narrows to uncategorized transactions and stops at the limit', () => {
    expect(ids({ uncategorizedOnly: true })).toEqual(['t-4', 't-3']);
    expect(ids({ limit: 2 })).toEqual(['t-4', 't-3']);
  });

  it('rejects an inverted amount range', () => {
    expect(() => searchTransactions(snapshot, { minAmount: 2000, maxAmount: 1000 })).toThrow(ValidationError);
  });
});

describe('analyzeCreditCards', () => {
  const snapshot = buildSnapshot({
    accounts: [
      account('acct-checking', 'Checking'),
      account('acct-visa', 'Visa', { type: 'creditCard', balance: -120000 }),
      account('acct-amex', 'Amex', { type: 'creditCard', balance: -50000 }),
      account('acct-old-card', 'Old Card', { type: 'creditCard', closed: true, balance: -1000 }),
      account('acct-store', 'Store Card', { type: 'creditCard', balance: 2000 }),
    ],
    categoryGroups: [group(GROUP_ID, 'Everyday'), group('grp-cc', 'Credit Card Payments')],
    categories: [
      category('cat-visa', 'Visa', { groupId: 'grp-cc' }),
      category('cat-amex', 'Amex', { groupId: 'grp-cc' }),
      category('cat-groceries', 'Groceries'),
    ],
    months: [
      month('2024-05', [monthEntry('cat-visa', 0, 20000)]),
      month('2024-06', [monthEntry('cat-visa', 0, 100000), monthEntry('cat-amex', 0, 30000)]),
    ],
  });

  it('compares open cards with their payment categories', () => {
    const report = analyzeCreditCards(snapshot, '2024-06');

    expect(report.month).toBe('2024-06');
    expect(report.cards).toEqual([
      {
        accountId: 'acct-amex',
        accountName: 'Amex',
        balance: -50000,
        owed: 50000,
        paymentCategoryId: 'cat-amex',
        paymentCategoryName: 'Amex',
        paymentAvailable: 30000,
        discrepancy: -20000,
        underfunded: true,
      },
      {
        accountId: 'acct-store',
        accountName: 'Store Card',
        balance: 2000,
        owed: 0,
        paymentCategoryId: null,
        paymentCategoryName: null,
        paymentAvailable: 0,
        discrepancy: 0,
        underfunded: false,
      },
      {
        accountId: 'acct-visa',
        accountName: 'Visa',
        balance: -120000,
        owed: 120000,
        paymentCategoryId: 'cat-visa',
        paymentCategoryName: 'Visa',
        paymentAvailable: 120000,
        discrepancy: 0,
        underfunded: false,
      },
    ]);
    expect(report.totalOwed).toBe(170000);
    expect(report.totalPaymentAvailable).toBe(150000);
  });
});

describe('computeBudgetAssignments', () => {
  const snapshot = buildSnapshot({
    categories: [
      category('cat-groceries', 'Groceries'),
      category('cat-dining', 'Dining'),
      category('cat-hidden', 'Hidden', { hidden: true }),
      category('cat-income', 'Paycheck'),
    ],
    months: [
      month('2024-05', [
        monthEntry('cat-groceries', 60000, -55000),
        monthEntry('cat-dining', 10000, -16000),
        monthEntry('cat-hidden', 5000, -1000),
        monthEntry('cat-income', 0, 300000),
      ]),
    ],
  });

  const proposed = (strategy?: Parameters<typeof computeBudgetAssignments>[2], source = '2024-05') =>
    computeBudgetAssignments(snapshot, source, strategy).map((line) => [line.categoryId, line.proposedBudgeted]);

  it('copies last month\'s budget by default', () => {
    expect(proposed()).toEqual([
      ['cat-groceries', 60000],
      ['cat-dining', 10000],
      ['cat-income', 0],
    ]);
  });

  it('budgets last month\'s spending, ignoring inflows', () => {
    expect(proposed('last_month_actual')).toEqual([
      ['cat-groceries', 55000],
      ['cat-dining', 16000],
      ['cat-income', 0],
    ]);
  });

  it('proposes nothing from a month without figures', () => {
    expect(proposed('last_month_budget', '2024-01')).toEqual([
      ['cat-groceries', 0],
      ['cat-dining', 0],
      ['cat-income', 0],
    ]);
  });
});
