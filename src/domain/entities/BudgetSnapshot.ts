import { SnapshotIntegrityError, type EntityKind } from '../errors.js';

/**
 * Account entity - a budget account (checking, credit card, ...)
 * `closed` accounts are treated like hidden entities by consumers.
 */
export interface Account {
  id: string;
  name: string;
  type: string;
  onBudget: boolean;
  closed: boolean;
  balance: number; // milliunits
  deleted: boolean;
}

export interface CategoryGroup {
  id: string;
  name: string;
  hidden: boolean;
  deleted: boolean;
}

export interface Category {
  id: string;
  groupId: string;
  name: string;
  hidden: boolean;
  deleted: boolean;
  note: string | null;
}

export interface Payee {
  id: string;
  name: string;
  transferAccountId: string | null;
  deleted: boolean;
}

export interface SubTransaction {
  id: string;
  transactionId: string;
  amount: number; // milliunits
  payeeId: string | null;
  categoryId: string | null;
  memo: string | null;
  deleted: boolean;
}

export type ClearedStatus = 'cleared' | 'uncleared' | 'reconciled';

/**
 * Transaction entity. May reference a deleted or unknown category/payee,
 * but always references an account present in the snapshot.
 */
export interface Transaction {
  id: string;
  date: string; // YYYY-MM-DD
  amount: number; // milliunits, negative = outflow
  memo: string | null;
  cleared: ClearedStatus;
  approved: boolean;
  accountId: string;
  payeeId: string | null;
  categoryId: string | null;
  transferAccountId: string | null;
  subtransactions: readonly SubTransaction[];
  deleted: boolean;
}

export interface ScheduledTransaction {
  id: string;
  dateFirst: string;
  dateNext: string;
  frequency: string;
  amount: number; // milliunits
  memo: string | null;
  accountId: string;
  payeeId: string | null;
  categoryId: string | null;
  deleted: boolean;
}

/**
 * Per-category figures for one budget month
 */
export interface CategoryMonth {
  categoryId: string;
  budgeted: number; // milliunits
  activity: number; // milliunits, negative = spending
  balance: number; // milliunits
}

export interface BudgetMonth {
  month: string; // YYYY-MM
  deleted: boolean;
  categories: ReadonlyMap<string, CategoryMonth>;
}

/**
 * BudgetSnapshot: immutable point-in-time view of all budget entities.
 * Never mutated after construction; a refresh produces a new snapshot.
 */
export interface BudgetSnapshot {
  readonly budgetId: string;
  readonly accounts: ReadonlyMap<string, Account>;
  readonly categoryGroups: ReadonlyMap<string, CategoryGroup>;
  readonly categories: ReadonlyMap<string, Category>;
  readonly payees: ReadonlyMap<string, Payee>;
  readonly transactions: ReadonlyMap<string, Transaction>;
  readonly scheduledTransactions: ReadonlyMap<string, ScheduledTransaction>;
  readonly months: ReadonlyMap<string, BudgetMonth>;
  readonly syncCursor: string | null; // opaque provider token
  readonly fetchedAt: string; // ISO 8601 timestamp
}

export interface MonthDelta {
  month: string;
  deleted: boolean;
  categories: CategoryMonth[];
}

/**
 * Entities changed since a sync cursor, as returned by the provider
 */
export interface EntityDelta {
  accounts?: Account[];
  categoryGroups?: CategoryGroup[];
  categories?: Category[];
  payees?: Payee[];
  transactions?: Transaction[];
  subtransactions?: SubTransaction[];
  scheduledTransactions?: ScheduledTransaction[];
  months?: MonthDelta[];
}

/**
 * Category groups maintained by the budget service itself
 */
export const INTERNAL_CATEGORY_GROUPS: ReadonlySet<string> = new Set([
  'Internal Master Category',
  'Hidden Categories',
]);

type Identified = { id: string };

function indexEntities<T extends Identified>(
  kind: EntityKind,
  base: ReadonlyMap<string, T> | null,
  entities: readonly T[] | undefined,
  rejectDuplicates: boolean
): Map<string, T> {
  const index = new Map<string, T>(base ?? []);
  const seen = new Set<string>();

  for (const entity of entities ?? []) {
    if (!entity.id) {
      throw new SnapshotIntegrityError(`${kind} without id`, { kind });
    }
    if (rejectDuplicates && seen.has(entity.id)) {
      throw new SnapshotIntegrityError(`Duplicate ${kind} id ${entity.id}`, { kind, id: entity.id });
    }
    seen.add(entity.id);
    index.set(entity.id, Object.freeze({ ...entity }));
  }

  return index;
}

/**
 * Subtransactions are separate entities in the delta feed: a changed parent
 * that lists none keeps the split lines it already had.
 */
function carryOverSplits(
  transactions: Map<string, Transaction>,
  base: ReadonlyMap<string, Transaction> | null,
  changed: readonly Transaction[] | undefined
): void {
  for (const txn of changed ?? []) {
    const previous = base?.get(txn.id);
    if (previous && previous.subtransactions.length > 0 && txn.subtransactions.length === 0) {
      transactions.set(txn.id, Object.freeze({ ...txn, subtransactions: previous.subtransactions }));
    }
  }
}

function applySubtransactions(
  transactions: Map<string, Transaction>,
  subtransactions: readonly SubTransaction[] | undefined
): void {
  const byParent = new Map<string, SubTransaction[]>();
  for (const sub of subtransactions ?? []) {
    const list = byParent.get(sub.transactionId) ?? [];
    list.push(sub);
    byParent.set(sub.transactionId, list);
  }

  for (const [parentId, subs] of byParent) {
    const parent = transactions.get(parentId);
    if (!parent) {
      continue; // subtransactions only live inside their parent
    }
    const merged = new Map<string, SubTransaction>(parent.subtransactions.map((s) => [s.id, s]));
    for (const sub of subs) {
      merged.set(sub.id, Object.freeze({ ...sub }));
    }
    transactions.set(
      parentId,
      Object.freeze({ ...parent, subtransactions: Object.freeze([...merged.values()]) })
    );
  }
}

function indexMonths(
  base: ReadonlyMap<string, BudgetMonth> | null,
  months: readonly MonthDelta[] | undefined
): Map<string, BudgetMonth> {
  const index = new Map<string, BudgetMonth>(base ?? []);

  for (const delta of months ?? []) {
    const key = delta.month.slice(0, 7);
    const categories = new Map<string, CategoryMonth>(index.get(key)?.categories ?? []);
    for (const entry of delta.categories) {
      categories.set(entry.categoryId, Object.freeze({ ...entry }));
    }
    index.set(key, Object.freeze({ month: key, deleted: delta.deleted, categories }));
  }

  return index;
}

function assertIntegrity(snapshot: BudgetSnapshot): void {
  for (const category of snapshot.categories.values()) {
    if (!snapshot.categoryGroups.has(category.groupId)) {
      throw new SnapshotIntegrityError(
        `Category ${category.id} references unknown group ${category.groupId}`,
        { categoryId: category.id, groupId: category.groupId }
      );
    }
  }

  for (const txn of snapshot.transactions.values()) {
    if (!snapshot.accounts.has(txn.accountId)) {
      throw new SnapshotIntegrityError(
        `Transaction ${txn.id} references unknown account ${txn.accountId}`,
        { transactionId: txn.id, accountId: txn.accountId }
      );
    }
  }

  for (const scheduled of snapshot.scheduledTransactions.values()) {
    if (!snapshot.accounts.has(scheduled.accountId)) {
      throw new SnapshotIntegrityError(
        `Scheduled transaction ${scheduled.id} references unknown account ${scheduled.accountId}`,
        { scheduledTransactionId: scheduled.id, accountId: scheduled.accountId }
      );
    }
  }
}

function buildSnapshot(
  budgetId: string,
  base: BudgetSnapshot | null,
  delta: EntityDelta,
  syncCursor: string | null,
  fetchedAt: string,
  rejectDuplicates: boolean
): BudgetSnapshot {
  const transactions = indexEntities(
    'transaction',
    base?.transactions ?? null,
    delta.transactions,
    rejectDuplicates
  );
  if (base) {
    carryOverSplits(transactions, base.transactions, delta.transactions);
  }
  applySubtransactions(transactions, delta.subtransactions);

  const snapshot: BudgetSnapshot = Object.freeze({
    budgetId,
    accounts: indexEntities('account', base?.accounts ?? null, delta.accounts, rejectDuplicates),
    categoryGroups: indexEntities(
      'category_group',
      base?.categoryGroups ?? null,
      delta.categoryGroups,
      rejectDuplicates
    ),
    categories: indexEntities(
      'category',
      base?.categories ?? null,
      delta.categories,
      rejectDuplicates
    ),
    payees: indexEntities('payee', base?.payees ?? null, delta.payees, rejectDuplicates),
    transactions,
    scheduledTransactions: indexEntities(
      'scheduled_transaction',
      base?.scheduledTransactions ?? null,
      delta.scheduledTransactions,
      rejectDuplicates
    ),
    months: indexMonths(base?.months ?? null, delta.months),
    syncCursor,
    fetchedAt,
  });

  assertIntegrity(snapshot);
  return snapshot;
}

/**
 * Create a full snapshot from a complete entity set
 */
export function createBudgetSnapshot(params: {
  budgetId: string;
  entities?: EntityDelta;
  syncCursor?: string | null;
  fetchedAt?: string;
}): BudgetSnapshot {
  if (!params.budgetId || params.budgetId.trim() === '') {
    throw new SnapshotIntegrityError('BudgetSnapshot: budgetId must be a non-empty string');
  }

  return buildSnapshot(
    params.budgetId,
    null,
    params.entities ?? {},
    params.syncCursor ?? null,
    params.fetchedAt ?? new Date().toISOString(),
    true
  );
}

/**
 * Merge a delta into a new snapshot. The base snapshot is left untouched.
 */
export function mergeDelta(
  base: BudgetSnapshot,
  delta: EntityDelta,
  syncCursor: string,
  fetchedAt: string
): BudgetSnapshot {
  return buildSnapshot(base.budgetId, base, delta, syncCursor, fetchedAt, false);
}

export function snapshotAgeMs(snapshot: BudgetSnapshot, now: Date): number {
  return now.getTime() - Date.parse(snapshot.fetchedAt);
}

export interface EntityByKind {
  account: Account;
  category_group: CategoryGroup;
  category: Category;
  payee: Payee;
  transaction: Transaction;
  scheduled_transaction: ScheduledTransaction;
}

function entityMaps(snapshot: BudgetSnapshot): {
  [K in EntityKind]: ReadonlyMap<string, EntityByKind[K]>;
} {
  return {
    account: snapshot.accounts,
    category_group: snapshot.categoryGroups,
    category: snapshot.categories,
    payee: snapshot.payees,
    transaction: snapshot.transactions,
    scheduled_transaction: snapshot.scheduledTransactions,
  };
}

/**
 * Look up any entity by kind and id, deleted entities included
 */
export function findEntity<K extends EntityKind>(
  snapshot: BudgetSnapshot,
  kind: K,
  id: string
): EntityByKind[K] | undefined {
  return entityMaps(snapshot)[kind].get(id);
}

export interface VisibilityOptions {
  includeHidden?: boolean;
}

export function isVisibleGroup(group: CategoryGroup, options: VisibilityOptions = {}): boolean {
  if (group.deleted || INTERNAL_CATEGORY_GROUPS.has(group.name)) {
    return false;
  }
  return options.includeHidden === true || !group.hidden;
}

/**
 * A category is visible only when it and its group are both visible
 */
export function isVisibleCategory(
  snapshot: BudgetSnapshot,
  category: Category,
  options: VisibilityOptions = {}
): boolean {
  const group = snapshot.categoryGroups.get(category.groupId);
  if (!group || !isVisibleGroup(group, options) || category.deleted) {
    return false;
  }
  return options.includeHidden === true || !category.hidden;
}

export function listAccounts(snapshot: BudgetSnapshot, options: VisibilityOptions = {}): Account[] {
  return [...snapshot.accounts.values()].filter(
    (a) => !a.deleted && (options.includeHidden === true || !a.closed)
  );
}

export function listCategoryGroups(
  snapshot: BudgetSnapshot,
  options: VisibilityOptions = {}
): CategoryGroup[] {
  return [...snapshot.categoryGroups.values()].filter((g) => isVisibleGroup(g, options));
}

export function listCategories(
  snapshot: BudgetSnapshot,
  options: VisibilityOptions = {}
): Category[] {
  return [...snapshot.categories.values()].filter((c) => isVisibleCategory(snapshot, c, options));
}

export function listPayees(snapshot: BudgetSnapshot): Payee[] {
  return [...snapshot.payees.values()].filter((p) => !p.deleted);
}

export function listTransactions(snapshot: BudgetSnapshot): Transaction[] {
  return [...snapshot.transactions.values()].filter((t) => !t.deleted);
}

export interface CategorizedLine {
  transactionId: string;
  date: string;
  accountId: string;
  payeeId: string | null;
  categoryId: string | null;
  amount: number;
  isTransfer: boolean;
}

/**
 * Flatten transactions into categorized lines: split transactions
 * contribute one line per non-deleted subtransaction.
 */
export function categorizedLines(snapshot: BudgetSnapshot): CategorizedLine[] {
  const lines: CategorizedLine[] = [];

  for (const txn of listTransactions(snapshot)) {
    const subs = txn.subtransactions.filter((s) => !s.deleted);
    if (subs.length === 0) {
      lines.push({
        transactionId: txn.id,
        date: txn.date,
        accountId: txn.accountId,
        payeeId: txn.payeeId,
        categoryId: txn.categoryId,
        amount: txn.amount,
        isTransfer: txn.transferAccountId !== null,
      });
      continue;
    }
    for (const sub of subs) {
      lines.push({
        transactionId: txn.id,
        date: txn.date,
        accountId: txn.accountId,
        payeeId: sub.payeeId ?? txn.payeeId,
        categoryId: sub.categoryId,
        amount: sub.amount,
        isTransfer: txn.transferAccountId !== null,
      });
    }
  }

  return lines;
}
