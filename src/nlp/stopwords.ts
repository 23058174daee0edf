import lists from './stopwords.json' with { type: 'json' };

/**
 * Fixed stop-word set for title terms: English (with generic academic
 * filler such as "study" or "approach"), Portuguese and Spanish.
 * No stemming, so results stay deterministic.
 */
export const STOPWORDS: ReadonlySet<string> = new Set([
    ...lists.en,
    ...lists.pt,
    ...lists.es,
]);
