import type { FrequencyEntry } from '../types/index.js';

/**
 * Count values and return the `topN` most frequent.
 *
 * Sorted by descending count; equal counts keep the order in which each
 * value first appeared (Map insertion order + stable sort).
 */
export function topFrequencies(values: Iterable<string>, topN: number): FrequencyEntry[] {
    if (topN <= 0) return [];

    const counts = new Map<string, number>();
    for (const value of values) {
        counts.set(value, (counts.get(value) ?? 0) + 1);
    }

    return [...counts.entries()]
        .map(([value, count]) => ({ value, count }))
        .sort((a, b) => b.count - a.count)
        .slice(0, topN);
}
