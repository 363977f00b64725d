import {
  createBudgetSnapshot,
  findEntity,
  mergeDelta,
  snapshotAgeMs,
  type BudgetSnapshot,
  type EntityByKind,
} from '../domain/entities/BudgetSnapshot.js';
import {
  BudgetProviderError,
  isAppError,
  NotFoundError,
  StaleReferenceError,
  type EntityKind,
} from '../domain/errors.js';
import type { BudgetDataProvider, FetchResult } from '../infra/BudgetDataProvider.js';
import { logger } from '../infra/logger.js';

interface RefreshState {
  started: boolean;
}

interface InflightRefresh {
  promise: Promise<BudgetSnapshot>;
  /** invalidation generation the refresh was requested at */
  generation: number;
  state: RefreshState;
}

export interface SnapshotCacheOptions {
  budgetId: string;
  clock?: () => Date;
}

/**
 * SnapshotCache - owns the snapshot lifecycle for one budget.
 *
 * The current snapshot is replaced as a whole; callers holding an older one
 * keep a consistent view. Refreshes are serialized: concurrent callers share
 * the in-flight refresh, and a refresh needed for a later invalidation is
 * chained after it so no two fetches ever start from the same cursor.
 */
export class SnapshotCache {
  private readonly budgetId: string;
  private readonly clock: () => Date;
  private current: BudgetSnapshot | null = null;
  private inflight: InflightRefresh | null = null;
  private generation = 0;
  /** `${kind}:${id}` -> generation at which the write was recorded */
  private readonly pending = new Map<string, number>();

  constructor(
    private readonly provider: BudgetDataProvider,
    options: SnapshotCacheOptions
  ) {
    this.budgetId = options.budgetId;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Current snapshot if younger than `maxStalenessMs` and nothing was
   * invalidated since; otherwise a refreshed one
   */
  async getSnapshot(maxStalenessMs: number): Promise<BudgetSnapshot> {
    const snapshot = this.current;
    if (
      snapshot &&
      this.pending.size === 0 &&
      snapshotAgeMs(snapshot, this.clock()) <= maxStalenessMs
    ) {
      return snapshot;
    }

    if (this.inflight && this.inflight.generation === this.generation) {
      return this.inflight.promise;
    }
    return this.scheduleRefresh();
  }

  /**
   * Refresh regardless of staleness. Joins a queued refresh that has not
   * started fetching yet; otherwise queues a new one.
   */
  refresh(): Promise<BudgetSnapshot> {
    if (this.inflight && !this.inflight.state.started) {
      return this.inflight.promise;
    }
    return this.scheduleRefresh();
  }

  /**
   * Record a write the cache has not seen. The next getSnapshot refreshes.
   */
  invalidate(kind: EntityKind, id: string): void {
    this.generation += 1;
    this.pending.set(`${kind}:${id}`, this.generation);
    logger.debug('Snapshot invalidated', { kind, id, generation: this.generation });
  }

  isInvalidated(kind: EntityKind, id: string): boolean {
    return this.pending.has(`${kind}:${id}`);
  }

  peek(): BudgetSnapshot | null {
    return this.current;
  }

  /**
   * Entity by id, or StaleReferenceError when the snapshot does not know
   * the id yet. A deleted entity is a NotFoundError.
   */
  requireEntity<K extends EntityKind>(
    snapshot: BudgetSnapshot,
    kind: K,
    id: string
  ): EntityByKind[K] {
    const entity = findEntity(snapshot, kind, id);
    if (!entity) {
      throw new StaleReferenceError(kind, id);
    }
    if (entity.deleted) {
      throw new NotFoundError(kind, id);
    }
    return entity;
  }

  private scheduleRefresh(): Promise<BudgetSnapshot> {
    const previous = this.inflight?.promise ?? null;
    const state: RefreshState = { started: false };

    const promise: Promise<BudgetSnapshot> = this.runAfter(previous, state).finally(() => {
      if (this.inflight?.promise === promise) {
        this.inflight = null;
      }
    });

    this.inflight = { promise, generation: this.generation, state };
    return promise;
  }

  private async runAfter(
    previous: Promise<BudgetSnapshot> | null,
    state: RefreshState
  ): Promise<BudgetSnapshot> {
    if (previous) {
      await previous.catch((error: unknown) => {
        logger.debug('Previous snapshot refresh failed, refreshing again', {
          budgetId: this.budgetId,
          error: error instanceof Error ? error.message : String(error),
        });
        return null;
      });
    }

    state.started = true;
    return this.fetchAndCommit();
  }

  private async fetchAndCommit(): Promise<BudgetSnapshot> {
    const generation = this.generation;
    const base = this.current;
    const cursor = base?.syncCursor ?? null;

    logger.debug('Refreshing budget snapshot', { budgetId: this.budgetId, cursor });

    let result: FetchResult;
    try {
      result = await this.provider.fetch(this.budgetId, cursor);
    } catch (error) {
      logger.warn('Snapshot refresh failed; keeping previous snapshot', {
        budgetId: this.budgetId,
        cursor,
        error: error instanceof Error ? error.message : String(error),
      });
      if (isAppError(error)) {
        throw error;
      }
      throw new BudgetProviderError(
        `Failed to fetch budget ${this.budgetId}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const fetchedAt = this.clock().toISOString();
    const next = base
      ? mergeDelta(base, result.delta, result.cursor, fetchedAt)
      : createBudgetSnapshot({
          budgetId: this.budgetId,
          entities: result.delta,
          syncCursor: result.cursor,
          fetchedAt,
        });

    this.current = next;
    for (const [key, recordedAt] of this.pending) {
      if (recordedAt <= generation) {
        this.pending.delete(key);
      }
    }

    logger.info('Budget snapshot refreshed', {
      budgetId: this.budgetId,
      incremental: base !== null,
      cursor: result.cursor,
      transactions: next.transactions.size,
      pendingInvalidations: this.pending.size,
    });
    return next;
  }
}
