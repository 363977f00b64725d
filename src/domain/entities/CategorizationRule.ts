/**
 * One (payee, category) association in the rule table
 */
export interface CategoryAssociation {
  categoryId: string;
  count: number;
  lastSeenAt: string; // ISO 8601 timestamp
}

/**
 * CategorizationRule: everything learned about one payee.
 * Keyed by `id:<payeeId>` when the payee id is known, else `name:<normalized name>`.
 */
export interface CategorizationRule {
  payeeKey: string;
  payeeName: string | null;
  associations: CategoryAssociation[];
}

/**
 * Payee reference accepted by learn/suggest. A plain string is a payee name.
 */
export type PayeeRef = string | { payeeId?: string | null; payeeName?: string | null };

export interface CategorySuggestion {
  payeeKey: string;
  categoryId: string;
  confidence: number; // 0-1
  count: number;
  lastSeenAt: string;
}
