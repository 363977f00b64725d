import { beforeEach, describe, it, expect } from 'vitest';
import { SnapshotCache } from '../../../src/services/SnapshotCache.ts';
import {
  BudgetProviderError,
  NotFoundError,
  SnapshotIntegrityError,
  StaleReferenceError,
} from '../../../src/domain/errors.ts';
import { account, category, group, GROUP_ID, payee } from '../../support/builders.ts';
import { InMemoryBudgetProvider } from '../../support/InMemoryBudgetProvider.ts';

const MAX_STALENESS_MS = 60_000;

describe('SnapshotCache', () => {
  let provider: InMemoryBudgetProvider;
  let cache: SnapshotCache;
  let now: Date;

  beforeEach(() => {
    now = new Date('2024-06-15T12:00:00.000Z');
    provider = new InMemoryBudgetProvider({
      accounts: [account('acct-checking', 'Checking')],
      categoryGroups: [group(GROUP_ID, 'Everyday')],
      categories: [category('cat-groceries', 'Groceries')],
      payees: [payee('payee-heb', 'HEB #42'), payee('payee-old', 'Old Shop', { deleted: true })],
    });
    cache = new SnapshotCache(provider, { budgetId: 'budget-1', clock: () => now });
  });

  it('serves the cached snapshot while it is fresh', async () => {
    const first = await cache.getSnapshot(MAX_STALENESS_MS);
    const second = await cache.getSnapshot(MAX_STALENESS_MS);

    expect(second).toBe(first);
    expect(provider.fetchCursors).toEqual([null]);
    expect(first.syncCursor).toBe('1');
    expect(first.fetchedAt).toBe('2024-06-15T12:00:00.000Z');
  });

  it('refreshes incrementally once the snapshot is too old', async () => {
    const first = await cache.getSnapshot(MAX_STALENESS_MS);
    provider.seed({ categories: [category('cat-dining', 'Dining')] });
    now = new Date('2024-06-15T12:01:00.001Z');

    const second = await cache.getSnapshot(MAX_STALENESS_MS);

    expect(provider.fetchCursors).toEqual([null, '1']);
    expect(second).not.toBe(first);
    expect(second.syncCursor).toBe('2');
    expect([...second.categories.keys()]).toEqual(['cat-groceries', 'cat-dining']);
    expect(first.categories.has('cat-dining')).toBe(false);
  });

  it('shares one fetch between concurrent callers', async () => {
    const [a, b] = await Promise.all([
      cache.getSnapshot(MAX_STALENESS_MS),
      cache.getSnapshot(MAX_STALENESS_MS),
    ]);

    expect(a).toBe(b);
    expect(provider.fetchCursors).toEqual([null]);
  });

  it('keeps the previous snapshot and cursor when a fetch fails', async () => {
    const first = await cache.getSnapshot(MAX_STALENESS_MS);
    provider.seed({ categories: [category('cat-dining', 'Dining')] });
    provider.failNextFetch();

    await expect(cache.refresh()).rejects.toBeInstanceOf(BudgetProviderError);
    expect(cache.peek()).toBe(first);

    const recovered = await cache.refresh();
    expect(provider.fetchCursors).toEqual([null, '1', '1']);
    expect(recovered.categories.has('cat-dining')).toBe(true);
  });

  it('keeps the previous snapshot and cursor when a delta fails the integrity check', async () => {
    const first = await cache.getSnapshot(MAX_STALENESS_MS);
    provider.seed({ categories: [category('cat-orphan', 'Orphan', { groupId: 'grp-missing' })] });

    await expect(cache.refresh()).rejects.toBeInstanceOf(SnapshotIntegrityError);
    expect(cache.peek()).toBe(first);
    expect(cache.peek()?.syncCursor).toBe('1');

    provider.seed({ categoryGroups: [group('grp-missing', 'Later')] });
    const recovered = await cache.refresh();

    expect(provider.fetchCursors).toEqual([null, '1', '1']);
    expect(recovered.syncCursor).toBe('3');
    expect(recovered.categories.get('cat-orphan')?.groupId).toBe('grp-missing');
  });

  it('wraps unexpected fetch failures', async () => {
    provider.failNextFetch(new Error('socket hang up'));

    await expect(cache.getSnapshot(MAX_STALENESS_MS)).rejects.toThrow(
      new BudgetProviderError('Failed to fetch budget budget-1: socket hang up')
    );
    expect(cache.peek()).toBeNull();
  });

  it('refreshes after an invalidation even when fresh', async () => {
    await cache.getSnapshot(MAX_STALENESS_MS);
    cache.invalidate('category', 'cat-groceries');
    expect(cache.isInvalidated('category', 'cat-groceries')).toBe(true);

    await cache.getSnapshot(MAX_STALENESS_MS);

    expect(provider.fetchCursors).toEqual([null, '1']);
    expect(cache.isInvalidated('category', 'cat-groceries')).toBe(false);
  });

  it('keeps an invalidation recorded during a refresh for the next one', async () => {
    const releaseFirst = provider.holdFetches();
    const first = cache.getSnapshot(MAX_STALENESS_MS);
    cache.invalidate('transaction', 'txn-1');
    const second = cache.getSnapshot(MAX_STALENESS_MS);

    releaseFirst();
    const releaseSecond = provider.holdFetches();
    await first;
    expect(cache.isInvalidated('transaction', 'txn-1')).toBe(true);

    releaseSecond();
    await second;
    expect(cache.isInvalidated('transaction', 'txn-1')).toBe(false);
    expect(provider.fetchCursors).toEqual([null, '1']);
  });

  it('joins a forced refresh that has not started yet', async () => {
    const release = provider.holdFetches();
    const running = cache.refresh();
    const queued = cache.refresh();
    const joined = cache.refresh();

    expect(joined).toBe(queued);
    expect(joined).not.toBe(running);

    release();
    await Promise.all([running, queued]);
    expect(provider.fetchCursors).toEqual([null, '1']);
  });

  describe('requireEntity', () => {
    it('returns known entities', async () => {
      const snapshot = await cache.getSnapshot(MAX_STALENESS_MS);
      expect(cache.requireEntity(snapshot, 'payee', 'payee-heb').name).toBe('HEB #42');
    });

    it('reports unknown ids as stale', async () => {
      const snapshot = await cache.getSnapshot(MAX_STALENESS_MS);
      expect(() => cache.requireEntity(snapshot, 'payee', 'payee-new')).toThrow(StaleReferenceError);
    });

    it('reports deleted entities as not found', async () => {
      const snapshot = await cache.getSnapshot(MAX_STALENESS_MS);
      expect(() => cache.requireEntity(snapshot, 'payee', 'payee-old')).toThrow(NotFoundError);
    });
  });
});
