import type { DocumentRecord } from '../types/index.js';

/**
 * Real `Response` carrying a JSON body.
 */
export function jsonResponse(body: unknown, init: { status?: number; headers?: Record<string, string> } = {}): Response {
    return new Response(JSON.stringify(body), {
        status: init.status ?? 200,
        headers: { 'content-type': 'application/json', ...init.headers },
    });
}

/**
 * Scopus Search API envelope.
 */
export function scopusPage(total: number | string, entries: unknown[]): unknown {
    return {
        'search-results': {
            'opensearch:totalResults': String(total),
            'opensearch:itemsPerPage': String(entries.length),
            entry: entries,
        },
    };
}

/**
 * Minimal Scopus entry with identifier `SCOPUS_ID:<n>`.
 */
export function scopusEntry(n: number, fields: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        'dc:identifier': `SCOPUS_ID:${n}`,
        'dc:title': `Document ${n}`,
        'citedby-count': '0',
        ...fields,
    };
}

/**
 * Stub for `fetch` serving `total` generated entries, sliced by the
 * `start` / `count` query parameters of each request.
 */
export function pagedFetch(total: number): (input: string | URL | Request) => Promise<Response> {
    return async (input) => {
        const params = new URL(String(input)).searchParams;
        const start = Number(params.get('start'));
        const count = Number(params.get('count'));
        const entries: unknown[] = [];
        for (let i = start; i < Math.min(total, start + count); i++) {
            entries.push(scopusEntry(i));
        }
        return jsonResponse(scopusPage(total, entries));
    };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
    const items: T[] = [];
    for await (const item of iterable) {
        items.push(item);
    }
    return items;
}

export function makeRecord(overrides: Partial<DocumentRecord> & { id: string }): DocumentRecord {
    return {
        title: '',
        authors: [],
        year: null,
        venue: null,
        citationCount: 0,
        documentType: null,
        doi: null,
        url: null,
        ...overrides,
    };
}
