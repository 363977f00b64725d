import {
  AccountType,
  ScheduledTransactionFrequency,
  TransactionClearedStatus,
  api as YnabApi,
  type Account as YnabAccount,
  type Category as YnabCategory,
  type CategoryGroup as YnabCategoryGroup,
  type MonthDetail,
  type Payee as YnabPayee,
  type ScheduledTransactionSummary,
  type SubTransaction as YnabSubTransaction,
  type TransactionSummary,
} from 'ynab';
import type {
  Account,
  CategoryGroup,
  Category,
  ClearedStatus,
  MonthDelta,
  Payee,
  ScheduledTransaction,
  SubTransaction,
  Transaction,
} from '../domain/entities/BudgetSnapshot.js';
import { BudgetProviderError, ValidationError } from '../domain/errors.js';
import type {
  BudgetDataProvider,
  FetchResult,
  TransactionChanges,
  WriteOperation,
  WriteResult,
} from './BudgetDataProvider.js';
import { logger } from './logger.js';

type YnabTransaction = TransactionSummary & { subtransactions?: YnabSubTransaction[] };

const FREQUENCIES: readonly string[] = Object.values(ScheduledTransactionFrequency);
const ACCOUNT_TYPES: readonly string[] = Object.values(AccountType);

function isFrequency(value: string): value is ScheduledTransactionFrequency {
  return FREQUENCIES.includes(value);
}

function isAccountType(value: string): value is AccountType {
  return ACCOUNT_TYPES.includes(value);
}

function toCleared(status: TransactionClearedStatus): ClearedStatus {
  switch (status) {
    case TransactionClearedStatus.Cleared:
      return 'cleared';
    case TransactionClearedStatus.Reconciled:
      return 'reconciled';
    default:
      return 'uncleared';
  }
}

function fromCleared(status: ClearedStatus): TransactionClearedStatus {
  switch (status) {
    case 'cleared':
      return TransactionClearedStatus.Cleared;
    case 'reconciled':
      return TransactionClearedStatus.Reconciled;
    case 'uncleared':
      return TransactionClearedStatus.Uncleared;
  }
}

/**
 * YNAB error responses arrive as `{ error: { id, name, detail } }`
 */
export function describeYnabError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'error' in error) {
    const body = error.error;
    if (typeof body === 'object' && body !== null) {
      const id = 'id' in body ? String(body.id) : 'unknown';
      const detail = 'detail' in body ? String(body.detail) : 'no detail';
      return `YNAB ${id}: ${detail}`;
    }
  }
  return String(error);
}

function mapAccount(a: YnabAccount): Account {
  return {
    id: a.id,
    name: a.name,
    type: a.type,
    onBudget: a.on_budget,
    closed: a.closed,
    balance: a.balance,
    deleted: a.deleted,
  };
}

function mapGroup(g: YnabCategoryGroup): CategoryGroup {
  return { id: g.id, name: g.name, hidden: g.hidden, deleted: g.deleted };
}

function mapCategory(c: YnabCategory): Category {
  return {
    id: c.id,
    groupId: c.category_group_id,
    name: c.name,
    hidden: c.hidden,
    deleted: c.deleted,
    note: c.note ?? null,
  };
}

function mapPayee(p: YnabPayee): Payee {
  return {
    id: p.id,
    name: p.name,
    transferAccountId: p.transfer_account_id ?? null,
    deleted: p.deleted,
  };
}

function mapSubTransaction(s: YnabSubTransaction): SubTransaction {
  return {
    id: s.id,
    transactionId: s.transaction_id,
    amount: s.amount,
    payeeId: s.payee_id ?? null,
    categoryId: s.category_id ?? null,
    memo: s.memo ?? null,
    deleted: s.deleted,
  };
}

function mapTransaction(t: YnabTransaction): Transaction {
  return {
    id: t.id,
    date: t.date,
    amount: t.amount,
    memo: t.memo ?? null,
    cleared: toCleared(t.cleared),
    approved: t.approved,
    accountId: t.account_id,
    payeeId: t.payee_id ?? null,
    categoryId: t.category_id ?? null,
    transferAccountId: t.transfer_account_id ?? null,
    subtransactions: (t.subtransactions ?? []).map(mapSubTransaction),
    deleted: t.deleted,
  };
}

function mapScheduled(s: ScheduledTransactionSummary): ScheduledTransaction {
  return {
    id: s.id,
    dateFirst: s.date_first,
    dateNext: s.date_next,
    frequency: s.frequency,
    amount: s.amount,
    memo: s.memo ?? null,
    accountId: s.account_id,
    payeeId: s.payee_id ?? null,
    categoryId: s.category_id ?? null,
    deleted: s.deleted,
  };
}

function mapMonth(m: MonthDetail): MonthDelta {
  return {
    month: m.month.slice(0, 7),
    deleted: m.deleted,
    categories: m.categories.map((c) => ({
      categoryId: c.id,
      budgeted: c.budgeted,
      activity: c.activity,
      balance: c.balance,
    })),
  };
}

function parseCursor(cursor: string | null): number | undefined {
  if (cursor === null) {
    return undefined;
  }
  const knowledge = Number(cursor);
  if (!Number.isInteger(knowledge) || knowledge < 0) {
    throw new BudgetProviderError(`Invalid sync cursor '${cursor}'`);
  }
  return knowledge;
}

function transactionChanges(changes: TransactionChanges) {
  return {
    account_id: changes.accountId,
    date: changes.date,
    amount: changes.amount,
    payee_id: changes.payeeId,
    payee_name: changes.payeeName,
    category_id: changes.categoryId,
    memo: changes.memo,
    cleared: changes.cleared === undefined ? undefined : fromCleared(changes.cleared),
    approved: changes.approved,
  };
}

/**
 * YnabBudgetProvider - BudgetDataProvider backed by the YNAB API.
 * Incremental fetches use `last_knowledge_of_server`; the cursor is the
 * returned `server_knowledge` as a decimal string.
 */
export class YnabBudgetProvider implements BudgetDataProvider {
  private readonly client: YnabApi;

  constructor(accessToken: string) {
    if (!accessToken) {
      throw new ValidationError('YNAB access token is required');
    }
    this.client = new YnabApi(accessToken);
  }

  async fetch(budgetId: string, sinceCursor: string | null): Promise<FetchResult> {
    const lastKnowledge = parseCursor(sinceCursor);

    try {
      const response = await this.client.budgets.getBudgetById(budgetId, lastKnowledge);
      const budget = response.data.budget;

      const delta = {
        accounts: (budget.accounts ?? []).map(mapAccount),
        categoryGroups: (budget.category_groups ?? []).map(mapGroup),
        categories: (budget.categories ?? []).map(mapCategory),
        payees: (budget.payees ?? []).map(mapPayee),
        transactions: (budget.transactions ?? []).map(mapTransaction),
        subtransactions: (budget.subtransactions ?? []).map(mapSubTransaction),
        scheduledTransactions: (budget.scheduled_transactions ?? []).map(mapScheduled),
        months: (budget.months ?? []).map(mapMonth),
      };

      logger.debug('Fetched budget from YNAB', {
        budgetId,
        lastKnowledge,
        serverKnowledge: response.data.server_knowledge,
        transactions: delta.transactions.length,
      });

      return { delta, cursor: String(response.data.server_knowledge) };
    } catch (error) {
      throw new BudgetProviderError(`Failed to fetch budget: ${describeYnabError(error)}`, {
        budgetId,
        lastKnowledge,
      });
    }
  }

  async write(budgetId: string, operation: WriteOperation): Promise<WriteResult> {
    try {
      const result = await this.apply(budgetId, operation);
      logger.info('Applied budget write', { budgetId, kind: operation.kind });
      return result;
    } catch (error) {
      if (error instanceof ValidationError) {
        throw error;
      }
      throw new BudgetProviderError(
        `Failed to apply ${operation.kind}: ${describeYnabError(error)}`,
        { budgetId, kind: operation.kind }
      );
    }
  }

  private async apply(budgetId: string, operation: WriteOperation): Promise<WriteResult> {
    switch (operation.kind) {
      case 'create_transaction': {
        const t = operation.transaction;
        const response = await this.client.transactions.createTransaction(budgetId, {
          transaction: {
            account_id: t.accountId,
            date: t.date,
            amount: t.amount,
            payee_id: t.payeeId,
            payee_name: t.payeeName,
            category_id: t.categoryId,
            memo: t.memo,
            cleared: t.cleared === undefined ? undefined : fromCleared(t.cleared),
            approved: t.approved,
            subtransactions: t.subtransactions?.map((s) => ({
              amount: s.amount,
              category_id: s.categoryId,
              payee_id: s.payeeId,
              memo: s.memo,
            })),
          },
        });
        const created = response.data.transaction;
        if (!created) {
          throw new BudgetProviderError('YNAB did not return the created transaction');
        }
        return { kind: 'transaction', transaction: mapTransaction(created) };
      }

      case 'update_transaction': {
        const response = await this.client.transactions.updateTransaction(
          budgetId,
          operation.transactionId,
          { transaction: transactionChanges(operation.changes) }
        );
        return { kind: 'transaction', transaction: mapTransaction(response.data.transaction) };
      }

      case 'delete_transaction': {
        await this.client.transactions.deleteTransaction(budgetId, operation.transactionId);
        return { kind: 'transaction_deleted', transactionId: operation.transactionId };
      }

      case 'assign_budget': {
        const response = await this.client.categories.updateMonthCategory(
          budgetId,
          `${operation.month}-01`,
          operation.categoryId,
          { category: { budgeted: operation.budgeted } }
        );
        return {
          kind: 'budget_assigned',
          month: operation.month,
          categoryId: operation.categoryId,
          budgeted: response.data.category.budgeted,
        };
      }

      case 'rename_payee': {
        const response = await this.client.payees.updatePayee(budgetId, operation.payeeId, {
          payee: { name: operation.name },
        });
        return { kind: 'payee', payee: mapPayee(response.data.payee) };
      }

      case 'create_scheduled_transaction': {
        const s = operation.scheduledTransaction;
        if (!isFrequency(s.frequency)) {
          throw new ValidationError(`Unknown frequency '${s.frequency}'`, {
            allowed: FREQUENCIES,
          });
        }
        const response = await this.client.scheduledTransactions.createScheduledTransaction(
          budgetId,
          {
            scheduled_transaction: {
              account_id: s.accountId,
              date: s.date,
              frequency: s.frequency,
              amount: s.amount,
              payee_id: s.payeeId,
              payee_name: s.payeeName,
              category_id: s.categoryId,
              memo: s.memo,
            },
          }
        );
        return {
          kind: 'scheduled_transaction',
          scheduledTransaction: mapScheduled(response.data.scheduled_transaction),
        };
      }

      case 'delete_scheduled_transaction': {
        await this.client.scheduledTransactions.deleteScheduledTransaction(
          budgetId,
          operation.scheduledTransactionId
        );
        return {
          kind: 'scheduled_transaction_deleted',
          scheduledTransactionId: operation.scheduledTransactionId,
        };
      }

      case 'create_account': {
        const a = operation.account;
        if (!isAccountType(a.type)) {
          throw new ValidationError(`Unknown account type '${a.type}'`, { allowed: ACCOUNT_TYPES });
        }
        const response = await this.client.accounts.createAccount(budgetId, {
          account: { name: a.name, type: a.type, balance: a.balance },
        });
        return { kind: 'account', account: mapAccount(response.data.account) };
      }
    }
  }
}
