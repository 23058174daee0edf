/**
 * Search criteria submitted by the user.
 * Frozen once submitted; consumed by the fetcher.
 */
export interface SearchQuery {
    /** Boolean / field-qualified Scopus expression, e.g. `TITLE-ABS-KEY("machine learning")` */
    readonly expression: string;
    readonly yearFrom?: number;
    readonly yearTo?: number;
    /** Scopus document type code (`ar`, `cp`, `re`, ...) */
    readonly documentType?: string;
}

/**
 * One entry of the Scopus `search-results.entry` array, untouched.
 * Never trusted at use sites: read it through the normalizer only.
 */
export type RawRecord = unknown;

/**
 * Normalized document: the common shape every downstream stage works on.
 */
export interface DocumentRecord {
    /** Scopus identifier (`SCOPUS_ID:...`), EID, or `doi:<doi>` as a last resort */
    id: string;

    title: string;

    /** Author names in the order the source lists them */
    authors: string[];

    /** Publication year, or null when unknown */
    year: number | null;

    /** Journal / proceedings name, or null when unknown */
    venue: string | null;

    /** Always a non-negative integer */
    citationCount: number;

    documentType: string | null;
    doi: string | null;
    url: string | null;
}

/**
 * Ordered, id-deduplicated records from one search.
 */
export interface ResultSet {
    /** Canonical query string sent to the API */
    query: string;

    /** Match count declared by the API (may exceed `records.length`) */
    totalAvailable: number;

    records: DocumentRecord[];

    /** Raw entries dropped because no identifier could be derived */
    skipped: number;

    /** Entries dropped because an earlier page already returned the same id */
    duplicates: number;
}

/**
 * Accept either a full result set or just its records.
 */
export function recordsOf(input: ResultSet | readonly DocumentRecord[]): readonly DocumentRecord[] {
    return 'records' in input ? input.records : input;
}
