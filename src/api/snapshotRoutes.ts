import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { BudgetSnapshot } from '../domain/entities/BudgetSnapshot.js';
import type { BudgetService } from '../services/BudgetService.js';

export function summarizeSnapshot(snapshot: BudgetSnapshot) {
  return {
    budgetId: snapshot.budgetId,
    fetchedAt: snapshot.fetchedAt,
    syncCursor: snapshot.syncCursor,
    counts: {
      accounts: snapshot.accounts.size,
      categoryGroups: snapshot.categoryGroups.size,
      categories: snapshot.categories.size,
      payees: snapshot.payees.size,
      transactions: snapshot.transactions.size,
      scheduledTransactions: snapshot.scheduledTransactions.size,
      months: snapshot.months.size,
    },
  };
}

/**
 * Snapshot routes: summary of the cached snapshot and forced refresh
 */
export function createSnapshotRouter(budgetService: BudgetService): Router {
  const router = Router();

  /**
   * GET /api/snapshot - Summary of a fresh-enough snapshot
   */
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const snapshot = await budgetService.getSnapshot();
      res.json(summarizeSnapshot(snapshot));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/snapshot/refresh - Refresh regardless of staleness
   */
  router.post('/refresh', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const snapshot = await budgetService.refreshSnapshot();
      res.json(summarizeSnapshot(snapshot));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
