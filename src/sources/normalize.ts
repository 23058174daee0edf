import type { DocumentRecord, RawRecord } from '../types/index.js';
import {
    isObject,
    parseYear,
    readInteger,
    readString,
    splitAuthors,
    stripDoiPrefix,
    type JsonObject,
} from './utils.js';

/**
 * Scopus Search API entry fields we read (STANDARD and COMPLETE views).
 * Documentation only; the payload is still treated as `unknown`.
 *
 *   dc:identifier          "SCOPUS_ID:85012345678"
 *   eid                    "2-s2.0-85012345678"
 *   dc:title               title
 *   dc:creator             first author (STANDARD view)
 *   author[].authname      every author (COMPLETE view)
 *   prism:coverDate        "2020-05-01"
 *   prism:publicationName  venue
 *   citedby-count          "12"
 *   subtypeDescription     "Article", "Conference Paper", ...
 *   prism:doi / prism:url
 */

export interface NormalizedBatch {
    records: DocumentRecord[];
    skipped: number;
}

/**
 * Map one raw entry onto a DocumentRecord.
 * Returns null only when no identifier can be derived; every other
 * missing or malformed field falls back to its unknown/zero value.
 */
export function normalizeEntry(raw: RawRecord): DocumentRecord | null {
    if (!isObject(raw)) return null;

    const doi = stripDoiPrefix(readString(raw, 'prism:doi'));
    const id = readString(raw, 'dc:identifier')
        ?? readString(raw, 'eid')
        ?? (doi ? `doi:${doi}` : null);
    if (!id) return null;

    return {
        id,
        title: readString(raw, 'dc:title') ?? '',
        authors: readAuthors(raw),
        year: parseYear(readString(raw, 'prism:coverDate')),
        venue: readString(raw, 'prism:publicationName'),
        citationCount: Math.max(0, readInteger(raw, 'citedby-count') ?? 0),
        documentType: readString(raw, 'subtypeDescription'),
        doi,
        url: readString(raw, 'prism:url'),
    };
}

/**
 * Normalize a batch, counting entries that had to be dropped.
 */
export function normalizeEntries(raws: Iterable<RawRecord>): NormalizedBatch {
    const records: DocumentRecord[] = [];
    let skipped = 0;

    for (const raw of raws) {
        const record = normalizeEntry(raw);
        if (record) {
            records.push(record);
        } else {
            skipped++;
        }
    }

    return { records, skipped };
}

function readAuthors(raw: JsonObject): string[] {
    const names: string[] = [];

    const list = raw['author'];
    if (Array.isArray(list)) {
        for (const author of list) {
            if (typeof author === 'string') {
                names.push(...splitAuthors(author));
            } else if (isObject(author)) {
                const name = readString(author, 'authname')
                    ?? joinName(readString(author, 'surname'), readString(author, 'given-name'));
                if (name) names.push(...splitAuthors(name));
            }
        }
    }

    if (names.length === 0) {
        const creator = raw['dc:creator'];
        if (typeof creator === 'string') {
            names.push(...splitAuthors(creator));
        } else if (Array.isArray(creator)) {
            for (const value of creator) {
                if (typeof value === 'string') names.push(...splitAuthors(value));
            }
        }
    }

    return [...new Set(names)];
}

function joinName(surname: string | null, given: string | null): string | null {
    if (!surname) return null;
    return given ? `${surname}, ${given}` : surname;
}
