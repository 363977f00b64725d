import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { BudgetService } from '../services/BudgetService.js';
import { parseInput } from './validation.js';

const suggestQuerySchema = z.object({
  payee: z.string().trim().min(1, 'payee is required'),
});

const learnBodySchema = z.object({
  payee: z.string().trim().min(1),
  category: z.string().trim().min(1),
});

/**
 * Categorizer routes: suggestions, explicit learning and the rule table
 */
export function createCategorizerRouter(budgetService: BudgetService): Router {
  const router = Router();

  /**
   * GET /api/categorizer/suggest?payee=...
   */
  router.get('/suggest', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { payee } = parseInput(suggestQuerySchema, req.query);
      const suggestion = await budgetService.suggestCategory(payee);
      res.json({ suggestion });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/categorizer/learn - Record an explicit payee -> category choice
   */
  router.post('/learn', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseInput(learnBodySchema, req.body);
      const rule = await budgetService.learnCategory(body.payee, body.category);
      res.status(201).json({ rule });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/categorizer/rules
   */
  router.get('/rules', (_req: Request, res: Response) => {
    res.json({ rules: budgetService.categorizationRules() });
  });

  return router;
}
