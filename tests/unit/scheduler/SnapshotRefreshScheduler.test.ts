import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  cronExpressionFor,
  SnapshotRefreshScheduler,
} from '../../../src/scheduler/SnapshotRefreshScheduler.ts';
import { BudgetService } from '../../../src/services/BudgetService.ts';
import { Categorizer } from '../../../src/services/Categorizer.ts';
import { EntityResolver } from '../../../src/services/EntityResolver.ts';
import { SnapshotCache } from '../../../src/services/SnapshotCache.ts';
import { account, group, GROUP_ID } from '../../support/builders.ts';
import { InMemoryBudgetProvider } from '../../support/InMemoryBudgetProvider.ts';

const cronMocks = vi.hoisted(() => {
  const stop = vi.fn();
  return { stop, schedule: vi.fn(() => ({ stop })) };
});

vi.mock('node-cron', () => ({ default: { schedule: cronMocks.schedule } }));

describe('cronExpressionFor', () => {
  it('uses the minute field up to an hour', () => {
    expect(cronExpressionFor(15)).toBe('*/15 * * * *');
    expect(cronExpressionFor(59)).toBe('*/59 * * * *');
  });

  it('uses the hour field for whole hours', () => {
    expect(cronExpressionFor(60)).toBe('0 */1 * * *');
    expect(cronExpressionFor(360)).toBe('0 */6 * * *');
  });

  it('falls back to hourly ticks otherwise', () => {
    expect(cronExpressionFor(90)).toBe('0 * * * *');
    expect(cronExpressionFor(1440)).toBe('0 * * * *');
  });
});

describe('SnapshotRefreshScheduler', () => {
  let provider: InMemoryBudgetProvider;
  let budgetService: BudgetService;
  let now: Date;

  beforeEach(() => {
    vi.clearAllMocks();
    cronMocks.schedule.mockImplementation(() => ({ stop: cronMocks.stop }));
    now = new Date('2024-06-15T12:00:00.000Z');
    const clock = () => now;
    provider = new InMemoryBudgetProvider({
      accounts: [account('acct-checking', 'Checking')],
      categoryGroups: [group(GROUP_ID, 'Everyday')],
    });
    budgetService = new BudgetService(
      new SnapshotCache(provider, { budgetId: 'budget-1', clock }),
      provider,
      new EntityResolver(),
      new Categorizer({ clock }),
      { budgetId: 'budget-1', maxStalenessMs: 300_000, clock }
    );
  });

  it('schedules the cron task and stops it', () => {
    const scheduler = new SnapshotRefreshScheduler(budgetService, 30);

    scheduler.start();
    expect(cronMocks.schedule).toHaveBeenCalledWith('*/30 * * * *', expect.any(Function));

    scheduler.stop();
    expect(cronMocks.stop).toHaveBeenCalledTimes(1);
  });

  it('stays off with a zero interval', () => {
    new SnapshotRefreshScheduler(budgetService, 0).start();
    expect(cronMocks.schedule).not.toHaveBeenCalled();
  });

  it('refreshes on each tick unless paused', async () => {
    const scheduler = new SnapshotRefreshScheduler(budgetService, 30, () => now);

    await scheduler.runRefresh();
    expect(provider.fetchCursors).toEqual([null]);

    scheduler.pause();
    now = new Date('2024-06-15T13:00:00.000Z');
    await scheduler.runRefresh();
    expect(provider.fetchCursors).toEqual([null]);

    scheduler.resume();
    await scheduler.runRefresh();
    expect(provider.fetchCursors).toEqual([null, '1']);
  });

  it('skips ticks that arrive well before the interval', async () => {
    const scheduler = new SnapshotRefreshScheduler(budgetService, 30, () => now);

    await scheduler.runRefresh();
    now = new Date('2024-06-15T12:10:00.000Z');
    await scheduler.runRefresh();
    expect(provider.fetchCursors).toEqual([null]);

    now = new Date('2024-06-15T12:29:00.000Z');
    await scheduler.runRefresh();
    expect(provider.fetchCursors).toEqual([null, '1']);
  });

  it('survives a failed refresh', async () => {
    const scheduler = new SnapshotRefreshScheduler(budgetService, 30, () => now);
    provider.failNextFetch();

    await expect(scheduler.runRefresh()).resolves.toBeUndefined();
    expect(provider.fetchCursors).toEqual([null]);
  });
});
