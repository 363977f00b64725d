import { z } from 'zod';
import { ValidationError } from '../domain/errors.js';
import { parseDisplayAmount } from '../domain/money.js';

/**
 * Parse request input against a schema, raising ValidationError with the issues
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      'Invalid request',
      result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }
  return result.data;
}

/**
 * Display amount ("12.50", "-$1,234.56" or a number of currency units) as milliunits
 */
export const amountSchema = z
  .union([z.number(), z.string().min(1)])
  .transform((value) => parseDisplayAmount(value));

export const monthSchema = z.string().regex(/^\d{4}-\d{2}(-\d{2})?$/, 'Expected YYYY-MM');

export const dateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

export const clearedSchema = z.enum(['cleared', 'uncleared', 'reconciled']);

/**
 * Query-string boolean: "true" / "1"
 */
export const flagSchema = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');
