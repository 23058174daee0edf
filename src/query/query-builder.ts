import type { SearchQuery } from '../types/index.js';
import { QueryError } from '../utils/errors.js';

/**
 * Validate user input and freeze it as a submitted query.
 */
export function freezeQuery(input: SearchQuery): Readonly<SearchQuery> {
    const expression = input.expression.trim();
    if (!expression) {
        throw new QueryError('Search expression is empty');
    }

    const { yearFrom, yearTo } = input;
    for (const [name, year] of [['yearFrom', yearFrom], ['yearTo', yearTo]] as const) {
        if (year !== undefined && !Number.isInteger(year)) {
            throw new QueryError(`${name} must be an integer year, got ${year}`);
        }
    }
    if (yearFrom !== undefined && yearTo !== undefined && yearFrom > yearTo) {
        throw new QueryError(`yearFrom (${yearFrom}) is after yearTo (${yearTo})`);
    }

    const documentType = input.documentType?.trim() || undefined;
    if (documentType !== undefined && !/^[a-z]{2}$/i.test(documentType)) {
        throw new QueryError(`Unknown document type code: ${documentType}`);
    }

    return Object.freeze({
        expression,
        ...(yearFrom !== undefined && { yearFrom }),
        ...(yearTo !== undefined && { yearTo }),
        ...(documentType !== undefined && { documentType: documentType.toLowerCase() }),
    });
}

/**
 * Build the canonical Scopus query string.
 *
 * `TITLE-ABS-KEY(ai)` with `yearFrom: 2020` becomes
 * `(TITLE-ABS-KEY(ai)) AND PUBYEAR > 2019`.
 */
export function buildQuery(input: SearchQuery): string {
    const query = freezeQuery(input);

    const filters: string[] = [];
    if (query.yearFrom !== undefined) filters.push(`PUBYEAR > ${query.yearFrom - 1}`);
    if (query.yearTo !== undefined) filters.push(`PUBYEAR < ${query.yearTo + 1}`);
    if (query.documentType !== undefined) filters.push(`DOCTYPE(${query.documentType})`);

    if (filters.length === 0) return query.expression;

    return [`(${query.expression})`, ...filters].join(' AND ');
}

/**
 * Query-string parameters for one page of results.
 */
export function buildRequestParams(query: string, start: number, count: number): URLSearchParams {
    return new URLSearchParams({
        query,
        start: String(start),
        count: String(count),
    });
}
