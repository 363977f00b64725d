import type { BudgetSnapshot } from '../entities/BudgetSnapshot.js';
import { InvalidAmountError } from '../errors.js';
import { isNegative } from '../money.js';
import { toMonthKey } from '../months.js';
import { runningBalance } from './overspending.js';

export interface AffordabilityResult {
  categoryId: string;
  month: string;
  requested: number;
  available: number;
  remainingAfter: number;
  budgeted: number;
  /** share of the budget already spent, percent; 0 without a budget */
  utilizationPct: number;
  canAfford: boolean;
}

/**
 * Whether `amount` (positive milliunits) fits in the category's available balance
 */
export function checkAffordability(
  snapshot: BudgetSnapshot,
  categoryId: string,
  month: string,
  amount: number
): AffordabilityResult {
  if (!Number.isInteger(amount) || amount < 0) {
    throw new InvalidAmountError(amount);
  }

  const { budgeted, activity, balance } = runningBalance(snapshot, month, categoryId);
  const remainingAfter = balance - amount;
  const spent = activity < 0 ? -activity : 0;

  return {
    categoryId,
    month: toMonthKey(month),
    requested: amount,
    available: balance,
    remainingAfter,
    budgeted,
    utilizationPct: budgeted > 0 ? Math.round((spent / budgeted) * 1000) / 10 : 0,
    canAfford: !isNegative(remainingAfter),
  };
}
