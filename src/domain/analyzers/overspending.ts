import { listCategories, type BudgetSnapshot } from '../entities/BudgetSnapshot.js';
import { isNegative, isPositive } from '../money.js';
import { shiftMonth, toMonthKey } from '../months.js';

export interface CategoryBalance {
  categoryId: string;
  name: string;
  budgeted: number;
  activity: number;
  balance: number; // running balance, milliunits
}

export interface OverspentCategory extends CategoryBalance {
  deficit: number; // positive milliunits
}

export interface MoveSuggestion {
  fromCategoryId: string;
  fromCategory: string;
  toCategoryId: string;
  toCategory: string;
  amount: number; // milliunits
}

export interface OverspendingReport {
  month: string;
  overspent: OverspentCategory[];
  sources: CategoryBalance[];
  suggestions: MoveSuggestion[];
  totalDeficit: number;
}

/**
 * Running balance for one category in one month:
 * carried-over positive balance + budgeted + activity.
 * Negative balances do not carry into the next month.
 */
export function runningBalance(
  snapshot: BudgetSnapshot,
  month: string,
  categoryId: string
): { budgeted: number; activity: number; balance: number } {
  const key = toMonthKey(month);
  const entry = snapshot.months.get(key)?.categories.get(categoryId);
  const previous = snapshot.months.get(shiftMonth(key, -1))?.categories.get(categoryId);

  const carried = Math.max(0, previous?.balance ?? 0);
  const budgeted = entry?.budgeted ?? 0;
  const activity = entry?.activity ?? 0;
  return { budgeted, activity, balance: carried + budgeted + activity };
}

function byName(a: { name: string }, b: { name: string }): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Overspent categories for a month, the categories that could cover them,
 * and a greedy plan of moves from the richest sources.
 */
export function detectOverspending(snapshot: BudgetSnapshot, month: string): OverspendingReport {
  const key = toMonthKey(month);
  const overspent: OverspentCategory[] = [];
  const sources: CategoryBalance[] = [];

  for (const category of listCategories(snapshot)) {
    const figures = runningBalance(snapshot, key, category.id);
    const row: CategoryBalance = { categoryId: category.id, name: category.name, ...figures };

    if (isNegative(row.balance)) {
      overspent.push({ ...row, deficit: -row.balance });
    } else if (isPositive(row.balance)) {
      sources.push(row);
    }
  }

  overspent.sort((a, b) => b.deficit - a.deficit || byName(a, b));
  sources.sort((a, b) => b.balance - a.balance || byName(a, b));

  const remaining = new Map(sources.map((s) => [s.categoryId, s.balance]));
  const suggestions: MoveSuggestion[] = [];

  for (const target of overspent) {
    let needed = target.deficit;
    for (const source of sources) {
      if (!isPositive(needed)) break;
      const available = remaining.get(source.categoryId) ?? 0;
      if (available <= 0) continue;

      const amount = Math.min(needed, available);
      suggestions.push({
        fromCategoryId: source.categoryId,
        fromCategory: source.name,
        toCategoryId: target.categoryId,
        toCategory: target.name,
        amount,
      });
      remaining.set(source.categoryId, available - amount);
      needed -= amount;
    }
  }

  return {
    month: key,
    overspent,
    sources,
    suggestions,
    totalDeficit: overspent.reduce((sum, c) => sum + c.deficit, 0),
  };
}
