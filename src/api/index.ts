import { Router } from 'express';
import { createSnapshotRouter } from './snapshotRoutes.js';
import { createResolveRouter } from './resolveRoutes.js';
import { createCategorizerRouter } from './categorizerRoutes.js';
import { createAnalysisRouter } from './analysisRoutes.js';
import { createTransactionRouter } from './transactionRoutes.js';
import { createBudgetRouter } from './budgetRoutes.js';
import type { BudgetService } from '../services/BudgetService.js';
import type { AnalysisService } from '../services/AnalysisService.js';

/**
 * Main API router - composes all route handlers.
 * Dependencies are injected from server.ts.
 */
export function createApiRouter(deps: {
  budgetService: BudgetService;
  analysisService: AnalysisService;
}): Router {
  const router = Router();

  router.use('/snapshot', createSnapshotRouter(deps.budgetService));
  router.use('/resolve', createResolveRouter(deps.budgetService));
  router.use('/categorizer', createCategorizerRouter(deps.budgetService));
  router.use('/analysis', createAnalysisRouter(deps.analysisService));
  router.use('/transactions', createTransactionRouter(deps.budgetService));
  router.use('/', createBudgetRouter(deps.budgetService));

  return router;
}
