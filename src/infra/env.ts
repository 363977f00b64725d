import { z, ZodError } from 'zod';
import { ConfigError } from '../domain/errors.js';

/**
 * Environment variable schema with strict validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(3000),

  // YNAB API
  YNAB_ACCESS_TOKEN: z.string().min(1),
  YNAB_BUDGET_ID: z.string().min(1).default('last-used'),

  // Snapshot cache
  CACHE_MAX_STALENESS_SECONDS: z.coerce.number().int().min(0).default(300),

  // Periodic refresh (0 disables)
  SYNC_INTERVAL_MINUTES: z.coerce
    .number()
    .int()
    .min(0, { message: 'SYNC_INTERVAL_MINUTES must be 0 (disabled) or more' })
    .default(30),

  // Resolver / categorizer policy
  RESOLVER_APPROXIMATE_THRESHOLD: z.coerce.number().min(0).max(100).default(80),
  CATEGORIZER_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.6),
  CATEGORIZER_HALF_LIFE_DAYS: z.coerce.number().positive().default(180),

  // Trend analysis
  TREND_MONTHS: z.coerce.number().int().min(1).default(3),
  ANOMALY_MULTIPLIER: z.coerce.number().positive().default(1.5),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment object, raising ConfigError with the failing keys
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(
        'Environment validation failed',
        error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
      );
    }
    throw error;
  }
}

/**
 * Validates process.env. Exits with code 1 if validation fails.
 */
export function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ConfigError && Array.isArray(error.details)) {
      console.error('❌ Environment validation failed:');
      for (const issue of error.details) {
        console.error(`  - ${JSON.stringify(issue)}`);
      }
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
