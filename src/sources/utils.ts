/**
 * Shared utilities for reading loosely-typed API payloads.
 * Each reader returns `null` for absent or malformed values instead of throwing.
 */

export type JsonObject = { [key: string]: unknown };

export function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Trimmed non-empty string, or null. Numbers are accepted and stringified
 * (Scopus returns some identifiers as either).
 */
export function readString(obj: JsonObject, key: string): string | null {
    const value = obj[key];
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    if (typeof value !== 'string') return null;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}

/**
 * Integer from a number or numeric string ("12", " 7 ", 3.0), or null.
 */
export function readInteger(obj: JsonObject, key: string): number | null {
    const value = obj[key];
    let parsed: number;
    if (typeof value === 'number') {
        parsed = value;
    } else if (typeof value === 'string' && /^\s*[-+]?\d+(\.\d+)?\s*$/.test(value)) {
        parsed = Number(value);
    } else {
        return null;
    }
    return Number.isFinite(parsed) ? Math.trunc(parsed) : null;
}

/**
 * Year from an ISO-ish date such as "2021-03-01" or "2021".
 */
export function parseYear(date: string | null): number | null {
    if (!date) return null;
    const match = /^(\d{4})(?:$|[-/])/.exec(date);
    if (!match?.[1]) return null;
    const year = Number(match[1]);
    return year > 0 ? year : null;
}

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .trim() || null;
}

/**
 * Split a delimited author string ("Silva A.; Costa B.") into names.
 * Commas are part of a name ("Silva, A"), so only semicolons separate.
 */
export function splitAuthors(value: string): string[] {
    return value
        .split(';')
        .map((name) => name.trim())
        .filter((name) => name.length > 0);
}
