import type {
  Account,
  EntityDelta,
  Payee,
  ScheduledTransaction,
  Transaction,
} from '../domain/entities/BudgetSnapshot.js';

/**
 * Result of one incremental fetch. `cursor` is opaque and replaces the
 * stored one only after the delta has been merged.
 */
export interface FetchResult {
  delta: EntityDelta;
  cursor: string;
}

export interface SplitLineInput {
  amount: number; // milliunits
  categoryId: string | null;
  payeeId?: string | null;
  memo?: string | null;
}

export interface NewTransaction {
  accountId: string;
  date: string; // YYYY-MM-DD
  amount: number; // milliunits
  payeeId?: string | null;
  payeeName?: string | null;
  categoryId?: string | null;
  memo?: string | null;
  cleared?: Transaction['cleared'];
  approved?: boolean;
  subtransactions?: SplitLineInput[];
}

export interface TransactionChanges {
  accountId?: string;
  date?: string;
  amount?: number;
  payeeId?: string | null;
  payeeName?: string | null;
  categoryId?: string | null;
  memo?: string | null;
  cleared?: Transaction['cleared'];
  approved?: boolean;
}

export interface NewScheduledTransaction {
  accountId: string;
  date: string; // first occurrence, YYYY-MM-DD
  frequency: string;
  amount: number; // milliunits
  payeeId?: string | null;
  payeeName?: string | null;
  categoryId?: string | null;
  memo?: string | null;
}

export interface NewAccount {
  name: string;
  type: string;
  balance: number; // milliunits
}

/**
 * Writes the provider can apply to the remote budget
 */
export type WriteOperation =
  | { kind: 'create_transaction'; transaction: NewTransaction }
  | { kind: 'update_transaction'; transactionId: string; changes: TransactionChanges }
  | { kind: 'delete_transaction'; transactionId: string }
  | { kind: 'assign_budget'; month: string; categoryId: string; budgeted: number }
  | { kind: 'rename_payee'; payeeId: string; name: string }
  | { kind: 'create_scheduled_transaction'; scheduledTransaction: NewScheduledTransaction }
  | { kind: 'delete_scheduled_transaction'; scheduledTransactionId: string }
  | { kind: 'create_account'; account: NewAccount };

export type WriteResult =
  | { kind: 'transaction'; transaction: Transaction }
  | { kind: 'transaction_deleted'; transactionId: string }
  | { kind: 'budget_assigned'; month: string; categoryId: string; budgeted: number }
  | { kind: 'payee'; payee: Payee }
  | { kind: 'scheduled_transaction'; scheduledTransaction: ScheduledTransaction }
  | { kind: 'scheduled_transaction_deleted'; scheduledTransactionId: string }
  | { kind: 'account'; account: Account };

/**
 * BudgetDataProvider - the remote budget service as seen by the core.
 * Implementations raise BudgetProviderError on any remote failure.
 */
export interface BudgetDataProvider {
  fetch(budgetId: string, sinceCursor: string | null): Promise<FetchResult>;
  write(budgetId: string, operation: WriteOperation): Promise<WriteResult>;
}
