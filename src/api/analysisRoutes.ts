import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AnalysisService } from '../services/AnalysisService.js';
import { amountSchema, dateSchema, monthSchema, parseInput } from './validation.js';

const monthQuerySchema = z.object({ month: monthSchema.optional() });

const trendsQuerySchema = z.object({
  month: monthSchema.optional(),
  months: z.coerce.number().int().min(1).max(24).optional(),
  multiplier: z.coerce.number().positive().optional(),
});

const forecastQuerySchema = z.object({
  category: z.string().trim().min(1),
  month: monthSchema.optional(),
  asOf: dateSchema.optional(),
});

const affordabilityQuerySchema = z.object({
  category: z.string().trim().min(1),
  amount: amountSchema,
  month: monthSchema.optional(),
});

const uncategorizedQuerySchema = z.object({
  accountId: z.string().optional(),
  since: dateSchema.optional(),
});

/**
 * Analysis routes - read-only reports over the current snapshot
 */
export function createAnalysisRouter(analysisService: AnalysisService): Router {
  const router = Router();

  router.get('/overspending', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { month } = parseInput(monthQuerySchema, req.query);
      res.json(await analysisService.overspending(month));
    } catch (error) {
      next(error);
    }
  });

  router.get('/trends', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseInput(trendsQuerySchema, req.query);
      res.json(
        await analysisService.trends(query.month, {
          months: query.months,
          multiplier: query.multiplier,
        })
      );
    } catch (error) {
      next(error);
    }
  });

  router.get('/forecast', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseInput(forecastQuerySchema, req.query);
      res.json(await analysisService.forecast(query.category, query.month, query.asOf));
    } catch (error) {
      next(error);
    }
  });

  router.get('/affordability', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseInput(affordabilityQuerySchema, req.query);
      const amount = Math.abs(query.amount);
      res.json(await analysisService.affordability(query.category, amount, query.month));
    } catch (error) {
      next(error);
    }
  });

  router.get('/credit-cards', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { month } = parseInput(monthQuerySchema, req.query);
      res.json(await analysisService.creditCards(month));
    } catch (error) {
      next(error);
    }
  });

  router.get('/uncategorized', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseInput(uncategorizedQuerySchema, req.query);
      const items = await analysisService.uncategorized({
        accountId: query.accountId,
        sinceDate: query.since,
      });
      res.json({ items });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
