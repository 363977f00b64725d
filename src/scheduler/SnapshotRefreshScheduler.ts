import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../infra/logger.js';
import type { BudgetService } from '../services/BudgetService.js';

/**
 * Cron expression for a refresh every `intervalMinutes`.
 * Whole hours use the hour field; other intervals above 59 minutes run
 * hourly and rely on the elapsed-time check in the scheduler.
 */
export function cronExpressionFor(intervalMinutes: number): string {
  if (intervalMinutes <= 59) {
    return `*/${intervalMinutes} * * * *`;
  }
  if (intervalMinutes % 60 === 0 && intervalMinutes / 60 <= 23) {
    return `0 */${intervalMinutes / 60} * * *`;
  }
  return '0 * * * *';
}

/**
 * SnapshotRefreshScheduler - keeps the snapshot warm between requests
 */
export class SnapshotRefreshScheduler {
  private task: ScheduledTask | null = null;
  private isPaused = false;
  private lastRunAt: number | null = null;

  constructor(
    private readonly budgetService: BudgetService,
    private readonly intervalMinutes: number,
    private readonly clock: () => Date = () => new Date()
  ) {}

  pause(): void {
    this.isPaused = true;
    logger.info('SnapshotRefreshScheduler paused');
  }

  resume(): void {
    this.isPaused = false;
    logger.info('SnapshotRefreshScheduler resumed');
  }

  start(): void {
    if (this.intervalMinutes < 1) {
      logger.info('Snapshot refresh scheduler disabled');
      return;
    }

    const cronExpression = cronExpressionFor(this.intervalMinutes);
    this.task = cron.schedule(cronExpression, () => this.runRefresh());

    logger.info('SnapshotRefreshScheduler started', {
      intervalMinutes: this.intervalMinutes,
      cronExpression,
    });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('SnapshotRefreshScheduler stopped');
    }
  }

  /**
   * One scheduled tick. Failures are logged; the next tick retries.
   */
  async runRefresh(): Promise<void> {
    if (this.isPaused) {
      logger.info('Scheduled refresh skipped - scheduler is paused');
      return;
    }

    const now = this.clock().getTime();
    const intervalMs = this.intervalMinutes * 60_000;
    // hourly fallback ticks arrive more often than the interval; allow a minute of jitter
    if (this.lastRunAt !== null && now - this.lastRunAt < intervalMs - 60_000) {
      return;
    }
    this.lastRunAt = now;

    try {
      const snapshot = await this.budgetService.refreshSnapshot();
      logger.info('Scheduled snapshot refresh complete', {
        budgetId: snapshot.budgetId,
        cursor: snapshot.syncCursor,
      });
    } catch (error) {
      logger.error('Scheduled snapshot refresh failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

export function startScheduler(
  budgetService: BudgetService,
  intervalMinutes: number
): SnapshotRefreshScheduler {
  const scheduler = new SnapshotRefreshScheduler(budgetService, intervalMinutes);
  scheduler.start();
  return scheduler;
}
