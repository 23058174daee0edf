import type { AppConfig, DocumentRecord, ResultSet, SearchQuery } from '../types/index.js';
import { buildQuery } from '../query/query-builder.js';
import { ScopusFetcher } from '../sources/scopus.js';
import { normalizeEntry } from '../sources/normalize.js';
import { requireApiKey } from '../utils/config.js';
import { createHttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

export interface SearchOptions {
    fetcher: ScopusFetcher;
    /** Stop after this many raw entries */
    maxRecords?: number;
}

/**
 * Run one search end to end:
 *
 * 1. Build the canonical query string
 * 2. Page through the API
 * 3. Normalize each entry, counting the ones without an identifier
 * 4. Drop repeated ids, keeping the first occurrence in API order
 *
 * Any fetch error propagates unchanged; no partial result set is returned.
 */
export async function search(query: SearchQuery, options: SearchOptions): Promise<ResultSet> {
    const { fetcher, maxRecords } = options;
    const canonical = buildQuery(query);
    const logger = getLogger();

    logger.info({ query: canonical, maxRecords }, 'Starting search');
    const startTime = Date.now();

    const records: DocumentRecord[] = [];
    const seen = new Set<string>();
    let totalAvailable = 0;
    let skipped = 0;
    let duplicates = 0;
    let remaining = maxRecords ?? Number.POSITIVE_INFINITY;

    for await (const page of fetcher.pages(canonical, maxRecords)) {
        totalAvailable = page.totalResults;

        for (const entry of page.entries) {
            if (remaining <= 0) break;
            remaining--;

            const record = normalizeEntry(entry);
            if (!record) {
                skipped++;
                continue;
            }
            if (seen.has(record.id)) {
                duplicates++;
                continue;
            }
            seen.add(record.id);
            records.push(record);
        }
    }

    if (skipped > 0) {
        logger.warn({ skipped }, 'Entries without an identifier were skipped');
    }
    logger.info(
        { collected: records.length, totalAvailable, skipped, duplicates, elapsedMs: Date.now() - startTime },
        'Search complete'
    );

    return { query: canonical, totalAvailable, records, skipped, duplicates };
}

/**
 * Bind `search` to a fetcher built from resolved configuration.
 * Fails with ConfigError when no API key is configured.
 */
export function createSearch(config: Readonly<AppConfig>): (query: SearchQuery, maxRecords?: number) => Promise<ResultSet> {
    const apiKey = requireApiKey(config);
    const fetcher = new ScopusFetcher(
        { ...config, apiKey },
        { httpClient: createHttpClient({ timeout: config.timeoutMs, retries: config.retries }) }
    );

    return (query, maxRecords = config.maxRecords) => search(query, { fetcher, maxRecords });
}
