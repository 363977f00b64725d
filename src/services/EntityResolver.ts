import {
  categorizedLines,
  listAccounts,
  listCategories,
  listCategoryGroups,
  listPayees,
  type BudgetSnapshot,
  type VisibilityOptions,
} from '../domain/entities/BudgetSnapshot.js';
import type {
  MatchStage,
  MatchedResult,
  ResolutionResult,
  ResolvableKind,
} from '../domain/entities/ResolutionResult.js';
import { AmbiguousError, NotFoundError, type AmbiguousCandidate } from '../domain/errors.js';
import { nameMatcher, type NameMatcher } from '../infra/NameMatcher.js';

/**
 * Policy constants for resolution. Approximate matching is heuristic;
 * the threshold is configurable rather than an invariant.
 */
export const RESOLVER_DEFAULTS = {
  /** fuzz.ratio >= this accepts an approximate match */
  APPROXIMATE_THRESHOLD: 80,
  /** Names listed in a not-found error */
  MAX_NOT_FOUND_HINTS: 10,
} as const;

const STAGE_SCORES: Record<MatchStage, number> = {
  exact: 1,
  prefix: 0.9,
  tokens: 0.75,
  approximate: 0.6,
};

interface NamedCandidate {
  id: string;
  name: string;
}

interface StageMatch {
  candidate: NamedCandidate;
  score: number;
}

type ActivityIndex = Record<ResolvableKind, Map<string, string>>;

export interface EntityResolverOptions {
  approximateThreshold?: number;
}

/**
 * EntityResolver - maps free-text names to entity ids using one snapshot.
 * Read-only: never mutates the snapshot and performs no I/O.
 */
export class EntityResolver {
  private readonly approximateThreshold: number;
  private readonly activityIndexes = new WeakMap<BudgetSnapshot, ActivityIndex>();

  constructor(
    options: EntityResolverOptions = {},
    private readonly matcher: NameMatcher = nameMatcher
  ) {
    this.approximateThreshold =
      options.approximateThreshold ?? RESOLVER_DEFAULTS.APPROXIMATE_THRESHOLD;
  }

  resolve(
    snapshot: BudgetSnapshot,
    kind: ResolvableKind,
    query: string,
    options: VisibilityOptions = {}
  ): ResolutionResult {
    const normalizedQuery = this.matcher.normalize(query);
    if (normalizedQuery === '') {
      return { status: 'not_found', kind, query };
    }

    const candidates = this.candidates(snapshot, kind, options).map((c) => ({
      ...c,
      normalized: this.matcher.normalize(c.name),
    }));

    const stages: Array<[MatchStage, () => StageMatch[]]> = [
      [
        'exact',
        () =>
          candidates
            .filter((c) => c.normalized === normalizedQuery)
            .map((c) => ({ candidate: c, score: STAGE_SCORES.exact })),
      ],
      [
        'prefix',
        () =>
          candidates
            .filter((c) => c.normalized.startsWith(normalizedQuery))
            .map((c) => ({ candidate: c, score: STAGE_SCORES.prefix })),
      ],
      [
        'tokens',
        () =>
          candidates
            .filter((c) => this.matcher.containsAllTokens(normalizedQuery, c.normalized))
            .map((c) => ({ candidate: c, score: STAGE_SCORES.tokens })),
      ],
      [
        'approximate',
        () =>
          candidates
            .map((c) => ({ candidate: c, ratio: this.matcher.similarity(normalizedQuery, c.normalized) }))
            .filter((m) => m.ratio >= this.approximateThreshold)
            .map((m) => ({ candidate: m.candidate, score: (STAGE_SCORES.approximate * m.ratio) / 100 })),
      ],
    ];

    for (const [stage, run] of stages) {
      const matches = run();
      if (matches.length === 1) {
        const [{ candidate, score }] = matches;
        return {
          status: 'matched',
          kind,
          query,
          id: candidate.id,
          name: candidate.name,
          stage,
          score,
        };
      }
      if (matches.length > 1) {
        return {
          status: 'ambiguous',
          kind,
          query,
          stage,
          candidates: this.rankCandidates(
            snapshot,
            kind,
            matches.map((m) => m.candidate)
          ),
        };
      }
    }

    return { status: 'not_found', kind, query };
  }

  /**
   * Resolve and raise NotFoundError / AmbiguousError for the non-matched outcomes
   */
  resolveOrThrow(
    snapshot: BudgetSnapshot,
    kind: ResolvableKind,
    query: string,
    options: VisibilityOptions = {}
  ): MatchedResult {
    const result = this.resolve(snapshot, kind, query, options);

    switch (result.status) {
      case 'matched':
        return result;
      case 'ambiguous':
        throw new AmbiguousError(kind, query, result.candidates);
      case 'not_found': {
        const available = this.candidates(snapshot, kind, options)
          .map((c) => c.name)
          .sort()
          .slice(0, RESOLVER_DEFAULTS.MAX_NOT_FOUND_HINTS);
        throw new NotFoundError(kind, query, available);
      }
    }
  }

  private candidates(
    snapshot: BudgetSnapshot,
    kind: ResolvableKind,
    options: VisibilityOptions
  ): NamedCandidate[] {
    switch (kind) {
      case 'account':
        return listAccounts(snapshot, options);
      case 'category':
        return listCategories(snapshot, options);
      case 'category_group':
        return listCategoryGroups(snapshot, options);
      case 'payee':
        return listPayees(snapshot);
    }
  }

  /**
   * Most recent transaction activity first, then alphabetical, then id
   */
  private rankCandidates(
    snapshot: BudgetSnapshot,
    kind: ResolvableKind,
    candidates: NamedCandidate[]
  ): AmbiguousCandidate[] {
    const activity = this.activityIndex(snapshot)[kind];

    return candidates
      .map((c) => ({ id: c.id, name: c.name, lastActivity: activity.get(c.id) ?? null }))
      .sort((a, b) => {
        if (a.lastActivity !== b.lastActivity) {
          if (a.lastActivity === null) return 1;
          if (b.lastActivity === null) return -1;
          return a.lastActivity < b.lastActivity ? 1 : -1;
        }
        const nameA = this.matcher.normalize(a.name);
        const nameB = this.matcher.normalize(b.name);
        if (nameA !== nameB) {
          return nameA < nameB ? -1 : 1;
        }
        return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
      });
  }

  private activityIndex(snapshot: BudgetSnapshot): ActivityIndex {
    const cached = this.activityIndexes.get(snapshot);
    if (cached) {
      return cached;
    }

    const index: ActivityIndex = {
      account: new Map(),
      category: new Map(),
      payee: new Map(),
      category_group: new Map(),
    };
    const touch = (map: Map<string, string>, id: string | null, date: string) => {
      if (id === null) return;
      const current = map.get(id);
      if (current === undefined || date > current) {
        map.set(id, date);
      }
    };

    for (const line of categorizedLines(snapshot)) {
      touch(index.account, line.accountId, line.date);
      touch(index.payee, line.payeeId, line.date);
      touch(index.category, line.categoryId, line.date);
      const groupId = line.categoryId ? snapshot.categories.get(line.categoryId)?.groupId : undefined;
      touch(index.category_group, groupId ?? null, line.date);
    }

    this.activityIndexes.set(snapshot, index);
    return index;
  }
}
