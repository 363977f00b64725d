import { listCategories, type BudgetSnapshot } from '../entities/BudgetSnapshot.js';
import { toMonthKey } from '../months.js';

export const BUDGET_SETUP_STRATEGIES = ['last_month_budget', 'last_month_actual'] as const;

/**
 * `last_month_budget` copies what was budgeted in the source month;
 * `last_month_actual` budgets what was spent there.
 */
export type BudgetSetupStrategy = (typeof BUDGET_SETUP_STRATEGIES)[number];

export interface ProposedAssignment {
  categoryId: string;
  name: string;
  sourceBudgeted: number;
  sourceActivity: number;
  proposedBudgeted: number;
}

export function computeBudgetAssignments(
  snapshot: BudgetSnapshot,
  sourceMonth: string,
  strategy: BudgetSetupStrategy = 'last_month_budget'
): ProposedAssignment[] {
  const figures = snapshot.months.get(toMonthKey(sourceMonth))?.categories;

  return listCategories(snapshot).map((category) => {
    const entry = figures?.get(category.id);
    const sourceBudgeted = entry?.budgeted ?? 0;
    const sourceActivity = entry?.activity ?? 0;
    return {
      categoryId: category.id,
      name: category.name,
      sourceBudgeted,
      sourceActivity,
      proposedBudgeted:
        strategy === 'last_month_actual' ? Math.max(0, -sourceActivity) : sourceBudgeted,
    };
  });
}
