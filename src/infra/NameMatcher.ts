import * as fuzz from 'fuzzball';

/**
 * NameMatcher - normalization and similarity for free-text entity names
 *
 * Normalization is shared by the resolver and the categorizer so that
 * "HEB #42", "heb 42" and " HEB  #42 " all land on the same key.
 */
export class NameMatcher {
  /**
   * Normalize a name for comparison
   * - Lowercase
   * - Replace punctuation with spaces
   * - Collapse multiple spaces
   * - Trim
   */
  normalize(name: string): string {
    return name
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s]/gu, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }

  tokens(name: string): string[] {
    const normalized = this.normalize(name);
    return normalized === '' ? [] : normalized.split(' ');
  }

  /**
   * Every query token appears somewhere in the candidate name
   */
  containsAllTokens(query: string, candidate: string): boolean {
    const queryTokens = this.tokens(query);
    if (queryTokens.length === 0) {
      return false;
    }
    const normalizedCandidate = this.normalize(candidate);
    return queryTokens.every((token) => normalizedCandidate.includes(token));
  }

  /**
   * Edit-distance similarity on normalized names, 0-100
   */
  similarity(query: string, candidate: string): number {
    return fuzz.ratio(this.normalize(query), this.normalize(candidate));
  }
}

export const nameMatcher = new NameMatcher();
