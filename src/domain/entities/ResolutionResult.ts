import type { AmbiguousCandidate } from '../errors.js';

/**
 * Entity kinds that can be resolved from free text
 */
export type ResolvableKind = 'account' | 'category' | 'payee' | 'category_group';

export const RESOLVABLE_KINDS: readonly ResolvableKind[] = [
  'account',
  'category',
  'payee',
  'category_group',
];

export function isResolvableKind(value: string): value is ResolvableKind {
  return (RESOLVABLE_KINDS as readonly string[]).includes(value);
}

/**
 * Resolution stages in the order they are tried
 */
export type MatchStage = 'exact' | 'prefix' | 'tokens' | 'approximate';

export interface MatchedResult {
  status: 'matched';
  kind: ResolvableKind;
  query: string;
  id: string;
  name: string;
  stage: MatchStage;
  score: number; // 0-1, decreasing per stage
}

export interface AmbiguousResult {
  status: 'ambiguous';
  kind: ResolvableKind;
  query: string;
  stage: MatchStage;
  candidates: AmbiguousCandidate[];
}

export interface NotFoundResult {
  status: 'not_found';
  kind: ResolvableKind;
  query: string;
}

export type ResolutionResult = MatchedResult | AmbiguousResult | NotFoundResult;
