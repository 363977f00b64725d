import express from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { YnabBudgetProvider } from './infra/YnabBudgetProvider.js';
import { SnapshotCache } from './services/SnapshotCache.js';
import { EntityResolver } from './services/EntityResolver.js';
import { Categorizer } from './services/Categorizer.js';
import { BudgetService } from './services/BudgetService.js';
import { AnalysisService } from './services/AnalysisService.js';
import { createApiRouter } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import { startScheduler, type SnapshotRefreshScheduler } from './scheduler/SnapshotRefreshScheduler.js';
import type { Request, Response, NextFunction } from 'express';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

const loggerInstance = createLogger(env);
setLogger(loggerInstance);

// Infrastructure
const provider = new YnabBudgetProvider(env.YNAB_ACCESS_TOKEN);

// Core services
const cache = new SnapshotCache(provider, { budgetId: env.YNAB_BUDGET_ID });
const resolver = new EntityResolver({
  approximateThreshold: env.RESOLVER_APPROXIMATE_THRESHOLD,
});
const categorizer = new Categorizer({
  minConfidence: env.CATEGORIZER_MIN_CONFIDENCE,
  halfLifeDays: env.CATEGORIZER_HALF_LIFE_DAYS,
});
const budgetService = new BudgetService(cache, provider, resolver, categorizer, {
  budgetId: env.YNAB_BUDGET_ID,
  maxStalenessMs: env.CACHE_MAX_STALENESS_SECONDS * 1000,
});
const analysisService = new AnalysisService(budgetService, {
  trendMonths: env.TREND_MONTHS,
  anomalyMultiplier: env.ANOMALY_MULTIPLIER,
});

const app = express();

app.use(cors());
app.use(express.json());

// Request logging middleware
app.use((req: Request, _res: Response, next: NextFunction) => {
  loggerInstance.info('Incoming request', {
    method: req.method,
    path: req.path,
    ip: req.ip,
  });
  next();
});

app.get('/health', (_req: Request, res: Response) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

// Ready once a snapshot has been loaded
app.get('/ready', (_req: Request, res: Response) => {
  const snapshot = cache.peek();
  if (!snapshot) {
    res.status(503).json({ status: 'not-ready' });
    return;
  }
  res.json({ status: 'ready', fetchedAt: snapshot.fetchedAt });
});

app.use('/api', createApiRouter({ budgetService, analysisService }));

app.use(notFoundHandler);
app.use(createErrorHandler(env));

let scheduler: SnapshotRefreshScheduler | null = null;

const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    budgetId: env.YNAB_BUDGET_ID,
  });

  // Warm the cache; a failure here is retried by the next request
  void budgetService.getSnapshot().then(
    (snapshot) => {
      loggerInstance.info('Initial snapshot loaded', {
        budgetId: snapshot.budgetId,
        transactions: snapshot.transactions.size,
      });
    },
    (error: unknown) => {
      loggerInstance.error('Initial snapshot load failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  );

  if (env.SYNC_INTERVAL_MINUTES > 0) {
    scheduler = startScheduler(budgetService, env.SYNC_INTERVAL_MINUTES);
  }
});

// Graceful shutdown
process.on('SIGTERM', () => {
  loggerInstance.info('SIGTERM received, shutting down gracefully');
  scheduler?.stop();
  server.close(() => {
    loggerInstance.info('Server closed');
    process.exit(0);
  });
});

export { app };
