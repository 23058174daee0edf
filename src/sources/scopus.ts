import { z } from 'zod';
import { MAX_PAGE_SIZE, type AppConfig, type RawRecord } from '../types/index.js';
import { buildRequestParams } from '../query/query-builder.js';
import { MalformedResponseError } from '../utils/errors.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

/**
 * Search API envelope. Only the fields pagination depends on are checked;
 * entries stay `unknown` until the normalizer reads them.
 */
const totalResultsSchema = z.union([
    z.number().int().nonnegative(),
    z.string().trim().regex(/^\d+$/, 'expected a non-negative integer').transform(Number),
]);

const searchResponseSchema = z.object({
    'search-results': z.object({
        'opensearch:totalResults': totalResultsSchema,
        entry: z.array(z.unknown()).optional(),
    }),
});

export interface ScopusPage {
    /** Offset this page was requested at */
    start: number;
    totalResults: number;
    entries: RawRecord[];
}

export type FetcherConfig = Pick<AppConfig, 'apiKey' | 'apiUrl' | 'pageSize' | 'timeoutMs'>;

/**
 * Paginated reader for the Scopus Search API.
 *
 * Each call to `pages()` / `records()` starts again at offset 0; the
 * fetcher keeps no state between calls. Pages are requested one at a
 * time and any failure aborts the whole iteration.
 *
 * @see https://dev.elsevier.com/documentation/ScopusSearchAPI.wadl
 */
export class ScopusFetcher {
    private readonly apiKey: string;
    private readonly apiUrl: string;
    private readonly pageSize: number;
    private readonly timeoutMs: number;
    private readonly httpClient: HttpClient;

    constructor(config: FetcherConfig & { apiKey: string }, options?: { httpClient?: HttpClient }) {
        this.apiKey = config.apiKey;
        this.apiUrl = config.apiUrl;
        this.pageSize = clampPageSize(config.pageSize);
        this.timeoutMs = config.timeoutMs;
        this.httpClient = options?.httpClient ?? getHttpClient({ timeout: config.timeoutMs });
    }

    /**
     * Yield pages until the declared total or `maxRecords` is reached,
     * or a page comes back empty.
     */
    async *pages(query: string, maxRecords?: number): AsyncGenerator<ScopusPage, void, undefined> {
        const cap = maxRecords ?? Number.POSITIVE_INFINITY;
        let start = 0;

        while (start < cap) {
            const page = await this.fetchPage(query, start);
            yield page;

            // The declared total can overshoot what the API actually serves
            if (page.entries.length === 0) break;

            start += this.pageSize;
            if (start >= page.totalResults) break;
        }
    }

    /**
     * Yield raw entries across pages, at most `maxRecords` of them.
     */
    async *records(query: string, maxRecords?: number): AsyncGenerator<RawRecord, void, undefined> {
        const cap = maxRecords ?? Number.POSITIVE_INFINITY;
        let emitted = 0;

        for await (const page of this.pages(query, maxRecords)) {
            for (const entry of page.entries) {
                if (emitted >= cap) return;
                yield entry;
                emitted++;
            }
        }
    }

    getPageSize(): number {
        return this.pageSize;
    }

    private async fetchPage(query: string, start: number): Promise<ScopusPage> {
        const params = buildRequestParams(query, start, this.pageSize);
        const url = `${this.apiUrl}?${params.toString()}`;
        getLogger().debug({ url, start }, 'Scopus page request');

        const response = await this.httpClient.get(url, {
            source: 'scopus',
            timeout: this.timeoutMs,
            headers: {
                'Accept': 'application/json',
                'X-ELS-APIKey': this.apiKey,
            },
        });

        const parsed = searchResponseSchema.safeParse(response.data);
        if (!parsed.success) {
            const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
            throw new MalformedResponseError(`Unexpected Scopus response shape at start=${start}`, issues);
        }

        const results = parsed.data['search-results'];
        const totalResults = results['opensearch:totalResults'];

        // An empty search still carries one placeholder entry ({ error: 'Result set was empty' })
        const entries = totalResults === 0 ? [] : results.entry ?? [];

        getLogger().debug({ start, totalResults, received: entries.length }, 'Scopus page received');
        return { start, totalResults, entries };
    }
}

export function clampPageSize(pageSize: number): number {
    if (!Number.isFinite(pageSize)) return MAX_PAGE_SIZE;
    return Math.min(MAX_PAGE_SIZE, Math.max(1, Math.trunc(pageSize)));
}
