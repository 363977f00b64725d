import { listTransactions, type BudgetSnapshot, type Transaction } from '../entities/BudgetSnapshot.js';
import { ValidationError } from '../errors.js';
import { needsCategory, newestFirst } from './uncategorized.js';

/**
 * Search criteria, all optional and combined with AND.
 * Text criteria are case-insensitive substrings; amounts are compared
 * as absolute milliunits so inflows and outflows share one range.
 */
export interface TransactionSearch {
  payee?: string;
  memo?: string;
  category?: string;
  account?: string;
  minAmount?: number;
  maxAmount?: number;
  sinceDate?: string; // YYYY-MM-DD, inclusive
  untilDate?: string; // YYYY-MM-DD, inclusive
  uncategorizedOnly?: boolean;
  limit?: number;
}

export interface TransactionMatch {
  transaction: Transaction;
  accountName: string | null;
  payeeName: string | null;
  categoryNames: string[];
}

function contains(haystack: string | null | undefined, needle: string | undefined): boolean {
  if (needle === undefined || needle === '') return true;
  return (haystack ?? '').toLowerCase().includes(needle.toLowerCase());
}

function categoryIdsOf(txn: Transaction): string[] {
  const lines = txn.subtransactions.filter((s) => !s.deleted);
  const ids = lines.length > 0 ? lines.map((s) => s.categoryId) : [txn.categoryId];
  return [...new Set(ids.filter((id): id is string => id !== null))];
}

export function searchTransactions(
  snapshot: BudgetSnapshot,
  search: TransactionSearch = {}
): TransactionMatch[] {
  if (
    search.minAmount !== undefined &&
    search.maxAmount !== undefined &&
    search.minAmount > search.maxAmount
  ) {
    throw new ValidationError('minAmount must not exceed maxAmount', {
      minAmount: search.minAmount,
      maxAmount: search.maxAmount,
    });
  }

  const matches: TransactionMatch[] = [];

  for (const txn of [...listTransactions(snapshot)].sort(newestFirst)) {
    if (search.sinceDate !== undefined && txn.date < search.sinceDate) continue;
    if (search.untilDate !== undefined && txn.date > search.untilDate) continue;
    if (search.uncategorizedOnly === true && !needsCategory(txn)) continue;

    const magnitude = Math.abs(txn.amount);
    if (search.minAmount !== undefined && magnitude < search.minAmount) continue;
    if (search.maxAmount !== undefined && magnitude > search.maxAmount) continue;
    if (!contains(txn.memo, search.memo)) continue;

    const accountName = snapshot.accounts.get(txn.accountId)?.name ?? null;
    if (!contains(accountName, search.account)) continue;

    const payeeName = txn.payeeId ? snapshot.payees.get(txn.payeeId)?.name ?? null : null;
    if (!contains(payeeName, search.payee)) continue;

    const categoryNames = categoryIdsOf(txn).map((id) => snapshot.categories.get(id)?.name ?? id);
    if (search.category !== undefined && !categoryNames.some((name) => contains(name, search.category))) {
      continue;
    }

    matches.push({ transaction: txn, accountName, payeeName, categoryNames });
    if (search.limit !== undefined && matches.length >= search.limit) break;
  }

  return matches;
}
