import {
  isVisibleCategory,
  type Account,
  type BudgetSnapshot,
  type Payee,
  type ScheduledTransaction,
  type Transaction,
  type VisibilityOptions,
} from '../domain/entities/BudgetSnapshot.js';
import type {
  CategorizationRule,
  CategorySuggestion,
  PayeeRef,
} from '../domain/entities/CategorizationRule.js';
import type { ResolutionResult, ResolvableKind } from '../domain/entities/ResolutionResult.js';
import {
  computeBudgetAssignments,
  type BudgetSetupStrategy,
  type ProposedAssignment,
} from '../domain/analyzers/budgetSetup.js';
import {
  searchTransactions,
  type TransactionMatch,
  type TransactionSearch,
} from '../domain/analyzers/search.js';
import {
  findUncategorizedTransactions,
  type UncategorizedFilter,
} from '../domain/analyzers/uncategorized.js';
import {
  BudgetProviderError,
  InvalidAmountError,
  NotFoundError,
  StaleReferenceError,
  ValidationError,
} from '../domain/errors.js';
import { amountsEqual } from '../domain/money.js';
import { isoDate, monthOfDate, parseIsoDate, shiftMonth, toMonthKey } from '../domain/months.js';
import type {
  BudgetDataProvider,
  NewTransaction,
  SplitLineInput,
  TransactionChanges,
  WriteOperation,
  WriteResult,
} from '../infra/BudgetDataProvider.js';
import { logger } from '../infra/logger.js';
import type { Categorizer, CategoryFilter } from './Categorizer.js';
import type { EntityResolver } from './EntityResolver.js';
import type { SnapshotCache } from './SnapshotCache.js';

/**
 * References to accounts, categories and payees are either an id or a name.
 * Ids are UUIDs; anything else goes through the resolver.
 */
const ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface SplitInput {
  amount: number; // milliunits
  category: string;
  memo?: string | null;
}

export interface CreateTransactionInput {
  account: string;
  date: string;
  amount: number; // milliunits, negative = outflow
  payee?: string;
  category?: string;
  memo?: string | null;
  cleared?: Transaction['cleared'];
  approved?: boolean;
  splits?: SplitInput[];
}

export type CategorySource = 'explicit' | 'suggested' | 'split' | 'none';

export interface CreatedTransaction {
  transaction: Transaction;
  categorySource: CategorySource;
  suggestion: CategorySuggestion | null;
}

export interface UpdateTransactionInput {
  account?: string;
  date?: string;
  amount?: number;
  payee?: string;
  /** null clears the category */
  category?: string | null;
  memo?: string | null;
  cleared?: Transaction['cleared'];
  approved?: boolean;
}

export interface CreateScheduledTransactionInput {
  account: string;
  date: string;
  frequency: string;
  amount: number;
  payee?: string;
  category?: string;
  memo?: string | null;
}

export interface CreateAccountInput {
  name: string;
  type: string;
  balance: number;
}

export interface BudgetAssignment {
  month: string;
  categoryId: string;
  budgeted: number;
}

export interface MoveMoneyInput {
  from: string;
  to: string;
  amount: number; // positive milliunits
  month?: string;
}

export interface MoneyMove {
  month: string;
  amount: number;
  from: BudgetAssignment;
  to: BudgetAssignment;
}

export interface BudgetSetupInput {
  /** target month; defaults to the month after the current one */
  month?: string;
  strategy?: BudgetSetupStrategy;
  /** false previews the assignments without writing them */
  apply?: boolean;
}

export interface BudgetSetupLine extends ProposedAssignment {
  currentBudgeted: number;
}

export interface BudgetSetupResult {
  month: string;
  sourceMonth: string;
  strategy: BudgetSetupStrategy;
  applied: boolean;
  assignments: BudgetSetupLine[];
  /** categories whose budgeted amount was written */
  written: string[];
}

export interface UncategorizedReviewItem {
  transaction: Transaction;
  payeeName: string | null;
  suggestion: (CategorySuggestion & { categoryName: string }) | null;
}

export interface BudgetServiceOptions {
  budgetId: string;
  maxStalenessMs: number;
  clock?: () => Date;
}

interface PayeeTarget {
  payeeId: string | null;
  payeeName: string | null;
}

function assertMilliunits(amount: number): void {
  if (!Number.isInteger(amount)) {
    throw new InvalidAmountError(amount);
  }
}

/**
 * BudgetService - request flows over the cache, resolver, categorizer and provider.
 *
 * Every successful write invalidates what it touched before returning, so the
 * next read sees the change. Categorized writes are fed to the categorizer.
 */
export class BudgetService {
  private readonly budgetId: string;
  private readonly maxStalenessMs: number;
  private readonly clock: () => Date;
  private learnedFrom: BudgetSnapshot | null = null;

  constructor(
    private readonly cache: SnapshotCache,
    private readonly provider: BudgetDataProvider,
    private readonly resolver: EntityResolver,
    private readonly categorizer: Categorizer,
    options: BudgetServiceOptions
  ) {
    this.budgetId = options.budgetId;
    this.maxStalenessMs = options.maxStalenessMs;
    this.clock = options.clock ?? (() => new Date());
  }

  async getSnapshot(): Promise<BudgetSnapshot> {
    return this.observe(await this.cache.getSnapshot(this.maxStalenessMs));
  }

  async refreshSnapshot(): Promise<BudgetSnapshot> {
    return this.observe(await this.cache.refresh());
  }

  /**
   * Run `work` against a fresh-enough snapshot. A StaleReferenceError forces
   * one refresh and a retry; a second miss is reported as NotFoundError.
   */
  async withSnapshot<T>(work: (snapshot: BudgetSnapshot) => T | Promise<T>): Promise<T> {
    try {
      return await work(await this.getSnapshot());
    } catch (error) {
      if (!(error instanceof StaleReferenceError)) {
        throw error;
      }
      logger.debug('Stale reference, forcing refresh', {
        kind: error.entityKind,
        id: error.entityId,
      });
    }

    try {
      return await work(await this.refreshSnapshot());
    } catch (error) {
      if (error instanceof StaleReferenceError) {
        throw new NotFoundError(error.entityKind, error.entityId);
      }
      throw error;
    }
  }

  /**
   * Id for an id-or-name reference
   */
  resolveId(
    snapshot: BudgetSnapshot,
    kind: ResolvableKind,
    ref: string,
    options: VisibilityOptions = {}
  ): string {
    const trimmed = ref.trim();
    if (ID_PATTERN.test(trimmed)) {
      return this.cache.requireEntity(snapshot, kind, trimmed).id;
    }
    return this.resolver.resolveOrThrow(snapshot, kind, trimmed, options).id;
  }

  async resolve(
    kind: ResolvableKind,
    query: string,
    options: VisibilityOptions = {}
  ): Promise<ResolutionResult> {
    const snapshot = await this.getSnapshot();
    return this.resolver.resolve(snapshot, kind, query, options);
  }

  async suggestCategory(
    payee: string
  ): Promise<CategorySuggestion & { categoryName: string | null }> {
    const snapshot = await this.getSnapshot();
    const suggestion = this.categorizer.suggestOrThrow(
      this.payeeRefFor(snapshot, payee),
      this.clock(),
      this.usableCategory(snapshot)
    );
    return {
      ...suggestion,
      categoryName: snapshot.categories.get(suggestion.categoryId)?.name ?? null,
    };
  }

  async learnCategory(payee: string, category: string): Promise<CategorizationRule> {
    return this.withSnapshot((snapshot) => {
      const categoryId = this.resolveId(snapshot, 'category', category);
      return this.categorizer.learn(this.payeeRefFor(snapshot, payee), categoryId, this.clock());
    });
  }

  categorizationRules(): CategorizationRule[] {
    return this.categorizer.rules();
  }

  async createTransaction(input: CreateTransactionInput): Promise<CreatedTransaction> {
    assertMilliunits(input.amount);
    parseIsoDate(input.date);

    const prepared = await this.withSnapshot((snapshot) => {
      const accountId = this.resolveId(snapshot, 'account', input.account);
      const payee = input.payee ? this.payeeTarget(snapshot, input.payee) : null;

      let categoryId: string | null = null;
      let categorySource: CategorySource = 'none';
      let suggestion: CategorySuggestion | null = null;
      let subtransactions: SplitLineInput[] | undefined;

      if (input.splits && input.splits.length > 0) {
        subtransactions = this.splitLines(snapshot, input.amount, input.splits);
        categorySource = 'split';
      } else if (input.category) {
        categoryId = this.resolveId(snapshot, 'category', input.category);
        categorySource = 'explicit';
      } else if (payee) {
        suggestion = this.categorizer.suggest(payee, this.clock(), this.usableCategory(snapshot));
        if (suggestion) {
          categoryId = suggestion.categoryId;
          categorySource = 'suggested';
        }
      }

      const transaction: NewTransaction = {
        accountId,
        date: input.date,
        amount: input.amount,
        payeeId: payee?.payeeId ?? null,
        payeeName: payee?.payeeId ? null : payee?.payeeName ?? null,
        categoryId,
        memo: input.memo ?? null,
        cleared: input.cleared,
        approved: input.approved,
        subtransactions,
      };
      return { transaction, categorySource, suggestion };
    });

    const result = await this.write({ kind: 'create_transaction', transaction: prepared.transaction });
    const transaction = this.expect(result, 'transaction').transaction;

    this.afterTransactionWrite(transaction, [prepared.transaction.accountId], input.payee ?? null);

    logger.info('Transaction created', {
      transactionId: transaction.id,
      categorySource: prepared.categorySource,
    });
    return {
      transaction,
      categorySource: prepared.categorySource,
      suggestion: prepared.suggestion,
    };
  }

  async updateTransaction(transactionId: string, input: UpdateTransactionInput): Promise<Transaction> {
    if (input.amount !== undefined) assertMilliunits(input.amount);
    if (input.date !== undefined) parseIsoDate(input.date);

    const prepared = await this.withSnapshot((snapshot) => {
      const existing = this.cache.requireEntity(snapshot, 'transaction', transactionId);
      const changes: TransactionChanges = {
        date: input.date,
        amount: input.amount,
        memo: input.memo,
        cleared: input.cleared,
        approved: input.approved,
      };

      if (input.account !== undefined) {
        changes.accountId = this.resolveId(snapshot, 'account', input.account);
      }
      const payee = input.payee !== undefined ? this.payeeTarget(snapshot, input.payee) : null;
      if (payee) {
        changes.payeeId = payee.payeeId;
        if (!payee.payeeId) {
          changes.payeeName = payee.payeeName;
        }
      }
      if (input.category === null) {
        changes.categoryId = null;
      } else if (input.category !== undefined) {
        changes.categoryId = this.resolveId(snapshot, 'category', input.category);
      }

      return { existing, changes, payeeName: payee?.payeeName ?? null };
    });

    const result = await this.write({
      kind: 'update_transaction',
      transactionId,
      changes: prepared.changes,
    });
    const transaction = this.expect(result, 'transaction').transaction;

    if (prepared.existing.categoryId) {
      this.cache.invalidate('category', prepared.existing.categoryId);
    }
    this.afterTransactionWrite(transaction, [prepared.existing.accountId], prepared.payeeName);
    return transaction;
  }

  async deleteTransaction(transactionId: string): Promise<void> {
    const existing = await this.withSnapshot((snapshot) =>
      this.cache.requireEntity(snapshot, 'transaction', transactionId)
    );

    await this.write({ kind: 'delete_transaction', transactionId });

    this.cache.invalidate('transaction', transactionId);
    this.cache.invalidate('account', existing.accountId);
    if (existing.categoryId) {
      this.cache.invalidate('category', existing.categoryId);
    }
    logger.info('Transaction deleted', { transactionId });
  }

  async assignBudget(month: string, category: string, budgeted: number): Promise<BudgetAssignment> {
    assertMilliunits(budgeted);
    const monthKey = toMonthKey(month);

    const categoryId = await this.withSnapshot((snapshot) =>
      this.resolveId(snapshot, 'category', category)
    );
    const result = this.expect(
      await this.write({ kind: 'assign_budget', month: monthKey, categoryId, budgeted }),
      'budget_assigned'
    );

    this.cache.invalidate('category', categoryId);
    return { month: result.month, categoryId: result.categoryId, budgeted: result.budgeted };
  }

  /**
   * Move budgeted money between two categories in one month:
   * two assignments computed from the month's current budgeted figures.
   */
  async moveMoney(input: MoveMoneyInput): Promise<MoneyMove> {
    assertMilliunits(input.amount);
    if (input.amount <= 0) {
      throw new InvalidAmountError(input.amount);
    }
    const month = input.month ? toMonthKey(input.month) : this.currentMonth();

    const plan = await this.withSnapshot((snapshot) => {
      const fromId = this.resolveId(snapshot, 'category', input.from);
      const toId = this.resolveId(snapshot, 'category', input.to);
      if (fromId === toId) {
        throw new ValidationError('Source and destination are the same category', {
          categoryId: fromId,
        });
      }
      const figures = snapshot.months.get(month)?.categories;
      return {
        fromId,
        toId,
        fromBudgeted: figures?.get(fromId)?.budgeted ?? 0,
        toBudgeted: figures?.get(toId)?.budgeted ?? 0,
      };
    });

    const from = this.expect(
      await this.write({
        kind: 'assign_budget',
        month,
        categoryId: plan.fromId,
        budgeted: plan.fromBudgeted - input.amount,
      }),
      'budget_assigned'
    );
    this.cache.invalidate('category', plan.fromId);

    const to = this.expect(
      await this.write({
        kind: 'assign_budget',
        month,
        categoryId: plan.toId,
        budgeted: plan.toBudgeted + input.amount,
      }),
      'budget_assigned'
    );
    this.cache.invalidate('category', plan.toId);

    logger.info('Budget moved', { month, from: plan.fromId, to: plan.toId, amount: input.amount });
    return {
      month,
      amount: input.amount,
      from: { month: from.month, categoryId: from.categoryId, budgeted: from.budgeted },
      to: { month: to.month, categoryId: to.categoryId, budgeted: to.budgeted },
    };
  }

  /**
   * Budget a month from the one before it. Only amounts that differ from
   * what the month already has are written.
   */
  async setupBudget(input: BudgetSetupInput = {}): Promise<BudgetSetupResult> {
    const month = input.month ? toMonthKey(input.month) : shiftMonth(this.currentMonth(), 1);
    const sourceMonth = shiftMonth(month, -1);
    const strategy = input.strategy ?? 'last_month_budget';

    const snapshot = await this.getSnapshot();
    const target = snapshot.months.get(month)?.categories;
    const assignments = computeBudgetAssignments(snapshot, sourceMonth, strategy).map((proposal) => ({
      ...proposal,
      currentBudgeted: target?.get(proposal.categoryId)?.budgeted ?? 0,
    }));

    const written: string[] = [];
    if (input.apply === true) {
      for (const line of assignments) {
        if (line.proposedBudgeted < 0 || line.proposedBudgeted === line.currentBudgeted) {
          continue;
        }
        this.expect(
          await this.write({
            kind: 'assign_budget',
            month,
            categoryId: line.categoryId,
            budgeted: line.proposedBudgeted,
          }),
          'budget_assigned'
        );
        this.cache.invalidate('category', line.categoryId);
        written.push(line.categoryId);
      }
      logger.info('Budget set up', { month, sourceMonth, strategy, written: written.length });
    }

    return { month, sourceMonth, strategy, applied: input.apply === true, assignments, written };
  }

  async searchTransactions(search: TransactionSearch = {}): Promise<TransactionMatch[]> {
    return searchTransactions(await this.getSnapshot(), search);
  }

  async renamePayee(payee: string, name: string): Promise<Payee> {
    const newName = name.trim();
    if (newName === '') {
      throw new ValidationError('Payee name must not be empty');
    }

    const payeeId = await this.withSnapshot((snapshot) => this.resolveId(snapshot, 'payee', payee));
    const result = this.expect(
      await this.write({ kind: 'rename_payee', payeeId, name: newName }),
      'payee'
    );

    this.cache.invalidate('payee', payeeId);
    return result.payee;
  }

  async createScheduledTransaction(
    input: CreateScheduledTransactionInput
  ): Promise<ScheduledTransaction> {
    assertMilliunits(input.amount);
    parseIsoDate(input.date);

    const scheduledTransaction = await this.withSnapshot((snapshot) => {
      const payee = input.payee ? this.payeeTarget(snapshot, input.payee) : null;
      return {
        accountId: this.resolveId(snapshot, 'account', input.account),
        date: input.date,
        frequency: input.frequency,
        amount: input.amount,
        payeeId: payee?.payeeId ?? null,
        payeeName: payee?.payeeId ? null : payee?.payeeName ?? null,
        categoryId: input.category ? this.resolveId(snapshot, 'category', input.category) : null,
        memo: input.memo ?? null,
      };
    });

    const result = this.expect(
      await this.write({ kind: 'create_scheduled_transaction', scheduledTransaction }),
      'scheduled_transaction'
    );

    this.cache.invalidate('scheduled_transaction', result.scheduledTransaction.id);
    if (result.scheduledTransaction.payeeId) {
      this.cache.invalidate('payee', result.scheduledTransaction.payeeId);
    }
    return result.scheduledTransaction;
  }

  async deleteScheduledTransaction(scheduledTransactionId: string): Promise<void> {
    await this.withSnapshot((snapshot) =>
      this.cache.requireEntity(snapshot, 'scheduled_transaction', scheduledTransactionId)
    );
    await this.write({ kind: 'delete_scheduled_transaction', scheduledTransactionId });
    this.cache.invalidate('scheduled_transaction', scheduledTransactionId);
  }

  async createAccount(input: CreateAccountInput): Promise<Account> {
    assertMilliunits(input.balance);
    const name = input.name.trim();
    if (name === '') {
      throw new ValidationError('Account name must not be empty');
    }

    const result = this.expect(
      await this.write({
        kind: 'create_account',
        account: { name, type: input.type, balance: input.balance },
      }),
      'account'
    );

    this.cache.invalidate('account', result.account.id);
    return result.account;
  }

  /**
   * Uncategorized transactions with the categorizer's suggestion for each
   */
  async reviewUncategorized(filter: UncategorizedFilter = {}): Promise<UncategorizedReviewItem[]> {
    const snapshot = await this.getSnapshot();
    const now = this.clock();
    const accept = this.usableCategory(snapshot);

    return findUncategorizedTransactions(snapshot, filter).map((transaction) => {
      const payee = transaction.payeeId ? snapshot.payees.get(transaction.payeeId) : undefined;
      const suggestion = transaction.payeeId
        ? this.categorizer.suggest(
            { payeeId: transaction.payeeId, payeeName: payee?.name ?? null },
            now,
            accept
          )
        : null;
      const category = suggestion ? snapshot.categories.get(suggestion.categoryId) : undefined;

      return {
        transaction,
        payeeName: payee?.name ?? null,
        suggestion: suggestion && category ? { ...suggestion, categoryName: category.name } : null,
      };
    });
  }

  private currentMonth(): string {
    return monthOfDate(isoDate(this.clock()));
  }

  /**
   * Learn from history once per snapshot reference
   */
  private observe(snapshot: BudgetSnapshot): BudgetSnapshot {
    if (snapshot !== this.learnedFrom) {
      this.learnedFrom = snapshot;
      this.categorizer.learnFromSnapshot(snapshot);
    }
    return snapshot;
  }

  private async write(operation: WriteOperation): Promise<WriteResult> {
    return this.provider.write(this.budgetId, operation);
  }

  private expect<K extends WriteResult['kind']>(
    result: WriteResult,
    kind: K
  ): Extract<WriteResult, { kind: K }> {
    if (!this.isKind(result, kind)) {
      throw new BudgetProviderError(`Unexpected write result '${result.kind}', expected '${kind}'`);
    }
    return result;
  }

  private isKind<K extends WriteResult['kind']>(
    result: WriteResult,
    kind: K
  ): result is Extract<WriteResult, { kind: K }> {
    return result.kind === kind;
  }

  /**
   * Payee to send with a write. Only an exact name match links an existing
   * payee; anything looser is sent by name so the service creates it.
   */
  private payeeTarget(snapshot: BudgetSnapshot, payee: string): PayeeTarget {
    const trimmed = payee.trim();
    if (ID_PATTERN.test(trimmed)) {
      const existing = this.cache.requireEntity(snapshot, 'payee', trimmed);
      return { payeeId: existing.id, payeeName: existing.name };
    }

    const result = this.resolver.resolve(snapshot, 'payee', trimmed);
    if (result.status === 'matched' && result.stage === 'exact') {
      return { payeeId: result.id, payeeName: result.name };
    }
    return { payeeId: null, payeeName: trimmed };
  }

  /**
   * Suggestions may only name categories a write could use
   */
  private usableCategory(snapshot: BudgetSnapshot): CategoryFilter {
    return (categoryId) => {
      const category = snapshot.categories.get(categoryId);
      return category !== undefined && isVisibleCategory(snapshot, category);
    };
  }

  private payeeRefFor(snapshot: BudgetSnapshot, payee: string): PayeeRef {
    const target = this.payeeTarget(snapshot, payee);
    return { payeeId: target.payeeId, payeeName: target.payeeName };
  }

  private splitLines(snapshot: BudgetSnapshot, total: number, splits: SplitInput[]): SplitLineInput[] {
    const lines = splits.map((split) => {
      assertMilliunits(split.amount);
      return {
        amount: split.amount,
        categoryId: this.resolveId(snapshot, 'category', split.category),
        memo: split.memo ?? null,
      };
    });

    const sum = lines.reduce((acc, line) => acc + line.amount, 0);
    if (!amountsEqual(sum, total)) {
      throw new ValidationError(`Split amounts sum to ${sum} but the transaction amount is ${total}`, {
        sum,
        total,
        difference: total - sum,
      });
    }
    return lines;
  }

  private afterTransactionWrite(
    transaction: Transaction,
    previousAccountIds: string[],
    payeeNameHint: string | null
  ): void {
    this.cache.invalidate('transaction', transaction.id);
    for (const accountId of new Set([transaction.accountId, ...previousAccountIds])) {
      this.cache.invalidate('account', accountId);
    }
    if (transaction.payeeId) {
      this.cache.invalidate('payee', transaction.payeeId);
    }

    const observedAt = `${transaction.date}T00:00:00.000Z`;
    const payeeName = transaction.payeeId
      ? this.cache.peek()?.payees.get(transaction.payeeId)?.name ?? payeeNameHint
      : null;
    const lines = transaction.subtransactions.filter((s) => !s.deleted);
    const categories = lines.length > 0 ? lines.map((s) => s.categoryId) : [transaction.categoryId];

    for (const categoryId of categories) {
      if (!categoryId) continue;
      this.cache.invalidate('category', categoryId);
      if (transaction.payeeId && transaction.transferAccountId === null) {
        this.categorizer.learn({ payeeId: transaction.payeeId, payeeName }, categoryId, observedAt, {
          transactionId: transaction.id,
        });
      }
    }
  }
}
