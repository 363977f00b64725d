/**
 * Application error types
 * Each error type maps to a specific HTTP status code at the API boundary.
 * The core raises these; only the boundary layer catches them.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Entity kinds known to the snapshot
 */
export type EntityKind =
  | 'account'
  | 'category_group'
  | 'category'
  | 'payee'
  | 'transaction'
  | 'scheduled_transaction';

/**
 * Remote budget service errors (502 Bad Gateway)
 */
export class BudgetProviderError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'BUDGET_PROVIDER_ERROR', 502, details);
  }
}

/**
 * Provider data that breaks snapshot invariants (502 Bad Gateway)
 */
export class SnapshotIntegrityError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'SNAPSHOT_INTEGRITY_ERROR', 502, details);
  }
}

/**
 * Validation errors from user input (400 Bad Request)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

export class InvalidAmountError extends AppError {
  constructor(input: unknown) {
    super(`Invalid amount: ${String(input)}`, 'INVALID_AMOUNT', 400, { input });
  }
}

export class InvalidDateError extends AppError {
  constructor(input: unknown, expected = 'YYYY-MM-DD') {
    super(`Invalid date: ${String(input)} (expected ${expected})`, 'INVALID_DATE', 400, {
      input,
      expected,
    });
  }
}

/**
 * Nothing matched a name query, or an id is unknown after a forced refresh (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(
    public readonly entityKind: EntityKind,
    public readonly query: string,
    public readonly available: string[] = []
  ) {
    super(
      available.length > 0
        ? `No ${entityKind} found matching '${query}'. Available: ${available.join(', ')}`
        : `No ${entityKind} found matching '${query}'`,
      'NOT_FOUND',
      404,
      { entityKind, query, available }
    );
  }
}

export interface AmbiguousCandidate {
  id: string;
  name: string;
  lastActivity: string | null;
}

/**
 * Several entities matched at the same resolution stage (409 Conflict)
 */
export class AmbiguousError extends AppError {
  constructor(
    public readonly entityKind: EntityKind,
    public readonly query: string,
    public readonly candidates: AmbiguousCandidate[]
  ) {
    super(
      `'${query}' matches ${candidates.length} ${entityKind} entries: ${candidates
        .map((c) => c.name)
        .join(', ')}`,
      'AMBIGUOUS',
      409,
      { entityKind, query, candidates }
    );
  }
}

/**
 * An id the current snapshot does not know about yet (409 Conflict).
 * Recoverable: force one refresh and retry.
 */
export class StaleReferenceError extends AppError {
  constructor(
    public readonly entityKind: EntityKind,
    public readonly entityId: string
  ) {
    super(
      `${entityKind} ${entityId} is not in the cached snapshot yet`,
      'STALE_REFERENCE',
      409,
      { entityKind, entityId }
    );
  }
}

/**
 * Categorizer confidence below threshold (422 Unprocessable Entity)
 */
export class NoSuggestionError extends AppError {
  constructor(payee: string, bestConfidence: number | null) {
    super(`No confident category suggestion for payee '${payee}'`, 'NO_SUGGESTION', 422, {
      payee,
      bestConfidence,
    });
  }
}

/**
 * Configuration errors - fail fast on startup (500 Internal Server Error)
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', 500, details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
