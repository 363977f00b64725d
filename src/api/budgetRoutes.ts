import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { BUDGET_SETUP_STRATEGIES } from '../domain/analyzers/budgetSetup.js';
import type { BudgetService } from '../services/BudgetService.js';
import { amountSchema, dateSchema, monthSchema, parseInput } from './validation.js';

const assignBodySchema = z.object({ budgeted: amountSchema });

const moveBodySchema = z.object({
  from: z.string().trim().min(1),
  to: z.string().trim().min(1),
  amount: amountSchema,
});

const setupBodySchema = z.object({
  strategy: z.enum(BUDGET_SETUP_STRATEGIES).default('last_month_budget'),
  apply: z.boolean().default(false),
});

const renamePayeeSchema = z.object({ name: z.string().trim().min(1) });

const createScheduledSchema = z.object({
  account: z.string().trim().min(1),
  date: dateSchema,
  frequency: z.string().trim().min(1),
  amount: amountSchema,
  payee: z.string().trim().min(1).optional(),
  category: z.string().trim().min(1).optional(),
  memo: z.string().nullable().optional(),
});

const createAccountSchema = z.object({
  name: z.string().trim().min(1),
  type: z.string().trim().min(1),
  balance: amountSchema.default(0),
});

/**
 * Budget structure routes: month assignments, payees, scheduled transactions, accounts
 */
export function createBudgetRouter(budgetService: BudgetService): Router {
  const router = Router();

  /**
   * PUT /api/months/:month/categories/:category - Set the budgeted amount
   */
  router.put(
    '/months/:month/categories/:category',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const month = parseInput(monthSchema, req.params.month);
        const { budgeted } = parseInput(assignBodySchema, req.body);
        const assignment = await budgetService.assignBudget(month, req.params.category, budgeted);
        res.json({ assignment });
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * POST /api/months/:month/moves - Move budgeted money between categories
   */
  router.post('/months/:month/moves', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const month = parseInput(monthSchema, req.params.month);
      const body = parseInput(moveBodySchema, req.body);
      const move = await budgetService.moveMoney({ ...body, month });
      res.json({ move });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/months/:month/setup - Preview or apply a month's budget
   * derived from the month before
   */
  router.post('/months/:month/setup', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const month = parseInput(monthSchema, req.params.month);
      const body = parseInput(setupBodySchema, req.body ?? {});
      res.json(await budgetService.setupBudget({ month, ...body }));
    } catch (error) {
      next(error);
    }
  });

  /**
   * PATCH /api/payees/:payee - Rename a payee (id or name)
   */
  router.patch('/payees/:payee', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { name } = parseInput(renamePayeeSchema, req.body);
      const payee = await budgetService.renamePayee(req.params.payee, name);
      res.json({ payee });
    } catch (error) {
      next(error);
    }
  });

  router.post('/scheduled-transactions', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseInput(createScheduledSchema, req.body);
      const scheduledTransaction = await budgetService.createScheduledTransaction(body);
      res.status(201).json({ scheduledTransaction });
    } catch (error) {
      next(error);
    }
  });

  router.delete(
    '/scheduled-transactions/:id',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        await budgetService.deleteScheduledTransaction(req.params.id);
        res.status(204).end();
      } catch (error) {
        next(error);
      }
    }
  );

  router.post('/accounts', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseInput(createAccountSchema, req.body);
      const account = await budgetService.createAccount(body);
      res.status(201).json({ account });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
