import { DEFAULT_CONFIG } from '../types/index.js';
import { STOPWORDS } from './stopwords.js';

/**
 * Tokenize text into an array of lowercase terms.
 * - Lowercase
 * - Split on anything that is not a letter or digit (accented letters included)
 * - Remove stopwords
 * - Remove pure numbers and tokens shorter than `minLength`
 * - No stemming (deterministic)
 */
export function tokenize(text: string, minLength = DEFAULT_CONFIG.minTermLength): string[] {
    if (!text) return [];

    return text
        .normalize('NFC')
        .toLowerCase()
        .split(/[^\p{L}\p{N}]+/u)
        .filter((token) =>
            [...token].length >= minLength &&
            !STOPWORDS.has(token) &&
            !/^\p{N}+$/u.test(token)
        );
}
