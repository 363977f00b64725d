import {
  categorizedLines,
  type BudgetSnapshot,
} from '../domain/entities/BudgetSnapshot.js';
import type {
  CategorizationRule,
  CategorySuggestion,
  PayeeRef,
} from '../domain/entities/CategorizationRule.js';
import { InvalidDateError, NoSuggestionError, ValidationError } from '../domain/errors.js';
import { nameMatcher, type NameMatcher } from '../infra/NameMatcher.js';
import { logger } from '../infra/logger.js';

/**
 * Policy constants for suggestions. Both are configurable.
 */
export const CATEGORIZER_DEFAULTS = {
  /** Suggestions below this confidence are withheld */
  MIN_CONFIDENCE: 0.6,
  /** An association loses half its weight against the others every this many days */
  HALF_LIFE_DAYS: 180,
} as const;

const DAY_MS = 24 * 60 * 60 * 1000;

interface AssociationState {
  count: number;
  lastSeenMs: number;
}

interface RuleState {
  payeeKey: string;
  payeeName: string | null;
  associations: Map<string, AssociationState>;
}

interface ScoredAssociation {
  categoryId: string;
  state: AssociationState;
  confidence: number;
}

/** Categories a suggestion may name; others are skipped but still count toward confidence */
export type CategoryFilter = (categoryId: string) => boolean;

export interface CategorizerOptions {
  minConfidence?: number;
  halfLifeDays?: number;
  clock?: () => Date;
}

/**
 * Categorizer - learns payee -> category associations and suggests categories.
 *
 * `learn` always records; `suggest` is gated by confidence so a declined
 * suggestion still leaves the explicit choice in the history.
 * All mutation is synchronous, so concurrent requests cannot lose increments.
 */
export class Categorizer {
  private readonly minConfidence: number;
  private readonly halfLifeDays: number;
  private readonly clock: () => Date;
  private readonly rulesByKey = new Map<string, RuleState>();
  /** name key -> id key, for payees seen with both */
  private readonly aliases = new Map<string, string>();
  /** `${transactionId}:${categoryId}` pairs already counted */
  private readonly countedTransactions = new Set<string>();

  constructor(
    options: CategorizerOptions = {},
    private readonly matcher: NameMatcher = nameMatcher
  ) {
    this.minConfidence = options.minConfidence ?? CATEGORIZER_DEFAULTS.MIN_CONFIDENCE;
    this.halfLifeDays = options.halfLifeDays ?? CATEGORIZER_DEFAULTS.HALF_LIFE_DAYS;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Record one observed categorization for a payee.
   * With `transactionId`, a transaction is counted at most once per category.
   */
  learn(
    payee: PayeeRef,
    categoryId: string,
    observedAt: Date | string,
    source: { transactionId?: string } = {}
  ): CategorizationRule {
    const key = this.keyFor(payee);
    if (key === null) {
      throw new ValidationError('Payee reference must include a payee id or name');
    }
    if (!categoryId) {
      throw new ValidationError('categoryId is required');
    }
    const observedMs = this.toTimestamp(observedAt);

    if (source.transactionId !== undefined) {
      const marker = `${source.transactionId}:${categoryId}`;
      const existing = this.rulesByKey.get(key);
      if (this.countedTransactions.has(marker) && existing) {
        return this.toRule(existing);
      }
      this.countedTransactions.add(marker);
    }

    const rule = this.ruleFor(key, payee);
    const association = rule.associations.get(categoryId);
    if (association) {
      association.count += 1;
      association.lastSeenMs = Math.max(association.lastSeenMs, observedMs);
    } else {
      rule.associations.set(categoryId, { count: 1, lastSeenMs: observedMs });
    }

    return this.toRule(rule);
  }

  /**
   * Best category for a payee, or null when confidence is below the floor
   */
  suggest(
    payee: PayeeRef,
    now: Date = this.clock(),
    accept?: CategoryFilter
  ): CategorySuggestion | null {
    const best = this.bestAssociation(payee, now, accept);
    if (!best || best.scored.confidence < this.minConfidence) {
      return null;
    }

    return {
      payeeKey: best.rule.payeeKey,
      categoryId: best.scored.categoryId,
      confidence: best.scored.confidence,
      count: best.scored.state.count,
      lastSeenAt: new Date(best.scored.state.lastSeenMs).toISOString(),
    };
  }

  suggestOrThrow(
    payee: PayeeRef,
    now: Date = this.clock(),
    accept?: CategoryFilter
  ): CategorySuggestion {
    const suggestion = this.suggest(payee, now, accept);
    if (!suggestion) {
      const best = this.bestAssociation(payee, now, accept);
      throw new NoSuggestionError(this.describe(payee), best ? best.scored.confidence : null);
    }
    return suggestion;
  }

  /**
   * Learn from transaction history. Safe to call after every refresh:
   * transactions already counted are skipped.
   */
  learnFromSnapshot(snapshot: BudgetSnapshot): number {
    let learned = 0;

    for (const line of categorizedLines(snapshot)) {
      if (line.isTransfer || line.categoryId === null || line.payeeId === null) {
        continue;
      }
      if (this.countedTransactions.has(`${line.transactionId}:${line.categoryId}`)) {
        continue;
      }
      const payee = snapshot.payees.get(line.payeeId);
      this.learn(
        { payeeId: line.payeeId, payeeName: payee?.name ?? null },
        line.categoryId,
        `${line.date}T00:00:00.000Z`,
        { transactionId: line.transactionId }
      );
      learned++;
    }

    if (learned > 0) {
      logger.debug('Categorizer learned from history', {
        budgetId: snapshot.budgetId,
        learned,
        rules: this.rulesByKey.size,
      });
    }
    return learned;
  }

  rules(): CategorizationRule[] {
    return [...this.rulesByKey.values()]
      .map((rule) => this.toRule(rule))
      .sort((a, b) => (a.payeeKey < b.payeeKey ? -1 : a.payeeKey > b.payeeKey ? 1 : 0));
  }

  /**
   * Rule key for a payee reference, or null when it carries neither id nor name.
   * A name already seen alongside a payee id maps to that id's rule.
   */
  keyFor(payee: PayeeRef): string | null {
    if (typeof payee !== 'string' && payee.payeeId) {
      return `id:${payee.payeeId}`;
    }
    const name = typeof payee === 'string' ? payee : payee.payeeName ?? '';
    const key = this.nameKey(name);
    return key === null ? null : this.aliases.get(key) ?? key;
  }

  private nameKey(name: string): string | null {
    const normalized = this.matcher.normalize(name);
    return normalized === '' ? null : `name:${normalized}`;
  }

  private ruleFor(key: string, payee: PayeeRef): RuleState {
    const payeeName = typeof payee === 'string' ? payee : payee.payeeName ?? null;
    let rule = this.rulesByKey.get(key);
    if (!rule) {
      rule = { payeeKey: key, payeeName, associations: new Map() };
      this.rulesByKey.set(key, rule);
    } else if (payeeName && !rule.payeeName) {
      rule.payeeName = payeeName;
    }

    if (typeof payee !== 'string' && payee.payeeId && payee.payeeName) {
      const aliasKey = this.nameKey(payee.payeeName);
      if (aliasKey !== null) {
        this.aliases.set(aliasKey, key);
        this.foldNameRule(aliasKey, rule);
      }
    }

    return rule;
  }

  /**
   * Move what was learned under a bare name into the id-keyed rule
   */
  private foldNameRule(nameKey: string, target: RuleState): void {
    const nameRule = this.rulesByKey.get(nameKey);
    if (!nameRule || nameRule === target) {
      return;
    }
    for (const [categoryId, state] of nameRule.associations) {
      const existing = target.associations.get(categoryId);
      if (existing) {
        existing.count += state.count;
        existing.lastSeenMs = Math.max(existing.lastSeenMs, state.lastSeenMs);
      } else {
        target.associations.set(categoryId, { ...state });
      }
    }
    this.rulesByKey.delete(nameKey);
  }

  private lookup(payee: PayeeRef): RuleState | undefined {
    if (typeof payee !== 'string' && payee.payeeId) {
      const byId = this.rulesByKey.get(`id:${payee.payeeId}`);
      if (byId || !payee.payeeName) {
        return byId;
      }
      return this.rulesByKey.get(this.keyFor(payee.payeeName) ?? '');
    }

    const key = this.keyFor(payee);
    return key === null ? undefined : this.rulesByKey.get(key);
  }

  private bestAssociation(
    payee: PayeeRef,
    now: Date,
    accept?: CategoryFilter
  ): { rule: RuleState; scored: ScoredAssociation } | null {
    const rule = this.lookup(payee);
    if (!rule || rule.associations.size === 0) {
      return null;
    }

    const weighted = [...rule.associations].map(([categoryId, state]) => {
      const ageDays = Math.max(0, (now.getTime() - state.lastSeenMs) / DAY_MS);
      return { categoryId, state, weight: state.count * Math.pow(0.5, ageDays / this.halfLifeDays) };
    });
    const totalWeight = weighted.reduce((sum, entry) => sum + entry.weight, 0);

    const scored: ScoredAssociation[] = weighted
      .filter((entry) => !accept || accept(entry.categoryId))
      .map(({ categoryId, state, weight }) => ({
        categoryId,
        state,
        confidence: totalWeight > 0 ? weight / totalWeight : 0,
      }));
    if (scored.length === 0) {
      return null;
    }

    scored.sort(
      (a, b) =>
        b.confidence - a.confidence ||
        b.state.lastSeenMs - a.state.lastSeenMs ||
        (a.categoryId < b.categoryId ? -1 : a.categoryId > b.categoryId ? 1 : 0)
    );

    return { rule, scored: scored[0] };
  }

  private toTimestamp(observedAt: Date | string): number {
    const ms = observedAt instanceof Date ? observedAt.getTime() : Date.parse(observedAt);
    if (Number.isNaN(ms)) {
      throw new InvalidDateError(observedAt, 'ISO 8601 timestamp');
    }
    return ms;
  }

  private toRule(rule: RuleState): CategorizationRule {
    return {
      payeeKey: rule.payeeKey,
      payeeName: rule.payeeName,
      associations: [...rule.associations].map(([categoryId, state]) => ({
        categoryId,
        count: state.count,
        lastSeenAt: new Date(state.lastSeenMs).toISOString(),
      })),
    };
  }

  private describe(payee: PayeeRef): string {
    if (typeof payee === 'string') {
      return payee;
    }
    return payee.payeeName ?? payee.payeeId ?? '';
  }
}
