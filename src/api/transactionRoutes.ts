import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { BudgetService } from '../services/BudgetService.js';
import { amountSchema, clearedSchema, dateSchema, flagSchema, parseInput } from './validation.js';

const splitSchema = z.object({
  amount: amountSchema,
  category: z.string().trim().min(1),
  memo: z.string().nullable().optional(),
});

const createTransactionSchema = z.object({
  account: z.string().trim().min(1),
  date: dateSchema,
  amount: amountSchema,
  payee: z.string().trim().min(1).optional(),
  category: z.string().trim().min(1).optional(),
  memo: z.string().nullable().optional(),
  cleared: clearedSchema.optional(),
  approved: z.boolean().optional(),
  splits: z.array(splitSchema).optional(),
});

const updateTransactionSchema = z
  .object({
    account: z.string().trim().min(1).optional(),
    date: dateSchema.optional(),
    amount: amountSchema.optional(),
    payee: z.string().trim().min(1).optional(),
    category: z.string().trim().min(1).nullable().optional(),
    memo: z.string().nullable().optional(),
    cleared: clearedSchema.optional(),
    approved: z.boolean().optional(),
  })
  .refine((body) => Object.values(body).some((value) => value !== undefined), {
    message: 'At least one field must be provided',
  });

const searchQuerySchema = z.object({
  payee: z.string().trim().min(1).optional(),
  memo: z.string().trim().min(1).optional(),
  category: z.string().trim().min(1).optional(),
  account: z.string().trim().min(1).optional(),
  minAmount: amountSchema.optional(),
  maxAmount: amountSchema.optional(),
  since: dateSchema.optional(),
  until: dateSchema.optional(),
  uncategorized: flagSchema,
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

/**
 * Transaction routes - writes go through BudgetService, which invalidates the cache
 */
export function createTransactionRouter(budgetService: BudgetService): Router {
  const router = Router();

  /**
   * GET /api/transactions - Search by payee, memo, category, account,
   * amount range (display units, either sign) and dates
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseInput(searchQuerySchema, req.query);
      const transactions = await budgetService.searchTransactions({
        payee: query.payee,
        memo: query.memo,
        category: query.category,
        account: query.account,
        minAmount: query.minAmount === undefined ? undefined : Math.abs(query.minAmount),
        maxAmount: query.maxAmount === undefined ? undefined : Math.abs(query.maxAmount),
        sinceDate: query.since,
        untilDate: query.until,
        uncategorizedOnly: query.uncategorized,
        limit: query.limit,
      });
      res.json({ transactions });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/transactions - Create a transaction; without a category the
   * categorizer's suggestion is applied when it is confident enough
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseInput(createTransactionSchema, req.body);
      const created = await budgetService.createTransaction(body);
      res.status(201).json(created);
    } catch (error) {
      next(error);
    }
  });

  /**
   * PATCH /api/transactions/:id
   */
  router.patch('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseInput(updateTransactionSchema, req.body);
      const transaction = await budgetService.updateTransaction(req.params.id, body);
      res.json({ transaction });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/transactions/:id
   */
  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await budgetService.deleteTransaction(req.params.id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
