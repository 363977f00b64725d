import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { isResolvableKind } from '../domain/entities/ResolutionResult.js';
import { ValidationError } from '../domain/errors.js';
import type { BudgetService } from '../services/BudgetService.js';
import { flagSchema, parseInput } from './validation.js';

const resolveQuerySchema = z.object({
  q: z.string().trim().min(1, 'q is required'),
  includeHidden: flagSchema,
});

/**
 * GET /api/resolve/:kind?q=... - Resolve a free-text name to an entity id
 */
export function createResolveRouter(budgetService: BudgetService): Router {
  const router = Router();

  router.get('/:kind', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { kind } = req.params;
      if (!isResolvableKind(kind)) {
        throw new ValidationError(`Unknown entity kind '${kind}'`, {
          allowed: ['account', 'category', 'payee', 'category_group'],
        });
      }
      const query = parseInput(resolveQuerySchema, req.query);

      const result = await budgetService.resolve(kind, query.q, {
        includeHidden: query.includeHidden,
      });
      res.json({ result });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
