/**
 * Keyword-density confidence shared by the specialized handlers.
 */

export const CONFIDENCE_BY_HITS = {
  many: 0.95,
  two: 0.85,
  one: 0.7
} as const;

/**
 * Count how many keywords occur in the text (case-insensitive substring match).
 * Each keyword counts at most once.
 */
export function countKeywordHits(text: string, keywords: readonly string[]): number {
  const lowered = text.toLowerCase();
  let hits = 0;
  for (const keyword of keywords) {
    if (lowered.includes(keyword)) {
      hits += 1;
    }
  }
  return hits;
}

export function matchedKeywords(text: string, keywords: readonly string[]): string[] {
  const lowered = text.toLowerCase();
  return keywords.filter((keyword) => lowered.includes(keyword));
}

export function keywordConfidence(text: string, keywords: readonly string[], baseline: number): number {
  const hits = countKeywordHits(text, keywords);
  if (hits >= 3) return CONFIDENCE_BY_HITS.many;
  if (hits === 2) return CONFIDENCE_BY_HITS.two;
  if (hits === 1) return CONFIDENCE_BY_HITS.one;
  return baseline;
}

/**
 * Share of a vocabulary present in the text, in [0, 1].
 */
export function keywordDensity(text: string, keywords: readonly string[]): number {
  if (keywords.length === 0) {
    return 0;
  }
  return countKeywordHits(text, keywords) / keywords.length;
}

export function containsAny(text: string, phrases: readonly string[]): boolean {
  return countKeywordHits(text, phrases) > 0;
}
