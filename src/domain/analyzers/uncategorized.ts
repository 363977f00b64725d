import { listTransactions, type BudgetSnapshot, type Transaction } from '../entities/BudgetSnapshot.js';

export interface UncategorizedFilter {
  accountId?: string;
  sinceDate?: string; // YYYY-MM-DD, inclusive
}

/**
 * Transfers need no category; a split needs one when any live line lacks one.
 */
export function needsCategory(txn: Transaction): boolean {
  if (txn.transferAccountId !== null) return false;
  const lines = txn.subtransactions.filter((s) => !s.deleted);
  return lines.length > 0 ? lines.some((s) => s.categoryId === null) : txn.categoryId === null;
}

export function newestFirst(a: Transaction, b: Transaction): number {
  return a.date !== b.date ? (a.date < b.date ? 1 : -1) : a.id < b.id ? -1 : 1;
}

/**
 * Transactions still waiting for a category, newest first
 */
export function findUncategorizedTransactions(
  snapshot: BudgetSnapshot,
  filter: UncategorizedFilter = {}
): Transaction[] {
  return listTransactions(snapshot)
    .filter((txn) => {
      if (filter.accountId !== undefined && txn.accountId !== filter.accountId) return false;
      if (filter.sinceDate !== undefined && txn.date < filter.sinceDate) return false;
      return needsCategory(txn);
    })
    .sort(newestFirst);
}
