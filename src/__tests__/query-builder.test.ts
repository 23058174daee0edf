import { describe, it, expect } from 'vitest';
import { buildQuery, buildRequestParams, freezeQuery } from '../query/query-builder.js';
import { QueryError } from '../utils/errors.js';

describe('Query builder', () => {
    describe('buildQuery', () => {
        it('should pass an unfiltered expression through trimmed', () => {
            expect(buildQuery({ expression: '  TITLE-ABS-KEY("digital libraries")  ' }))
                .toBe('TITLE-ABS-KEY("digital libraries")');
        });

        it('should add an inclusive year range', () => {
            expect(buildQuery({ expression: 'TITLE(ai)', yearFrom: 2020, yearTo: 2022 }))
                .toBe('(TITLE(ai)) AND PUBYEAR > 2019 AND PUBYEAR < 2023');
        });

        it('should accept a single bound', () => {
            expect(buildQuery({ expression: 'TITLE(ai)', yearTo: 2010 })).toBe('(TITLE(ai)) AND PUBYEAR < 2011');
        });

        it('should add a lowercased document type filter', () => {
            expect(buildQuery({ expression: 'AUTHOR-NAME(silva)', documentType: 'AR' }))
                .toBe('(AUTHOR-NAME(silva)) AND DOCTYPE(ar)');
        });

        it('should be deterministic', () => {
            const query = { expression: 'KEY(museum)', yearFrom: 2001, documentType: 'cp' };
            expect(buildQuery(query)).toBe(buildQuery(query));
        });

        it.each([
            [{ expression: '   ' }, 'Search expression is empty'],
            [{ expression: 'x', yearFrom: 2022, yearTo: 2020 }, 'yearFrom (2022) is after yearTo (2020)'],
            [{ expression: 'x', yearFrom: 2020.5 }, 'yearFrom must be an integer year, got 2020.5'],
            [{ expression: 'x', documentType: 'article' }, 'Unknown document type code: article'],
        ])('should reject %o', (query, message) => {
            expect(() => buildQuery(query)).toThrow(QueryError);
            expect(() => buildQuery(query)).toThrow(message);
        });
    });

    describe('freezeQuery', () => {
        it('should return a frozen copy without blank filters', () => {
            const query = freezeQuery({ expression: ' TITLE(ai) ', documentType: ' ' });

            expect(query).toEqual({ expression: 'TITLE(ai)' });
            expect(Object.isFrozen(query)).toBe(true);
        });
    });

    describe('buildRequestParams', () => {
        it('should encode query, start and count', () => {
            const params = buildRequestParams('TITLE("open access") AND PUBYEAR > 2019', 50, 25);

            expect(params.get('query')).toBe('TITLE("open access") AND PUBYEAR > 2019');
            expect(params.get('start')).toBe('50');
            expect(params.get('count')).toBe('25');
            expect(params.toString()).toBe('query=TITLE%28%22open+access%22%29+AND+PUBYEAR+%3E+2019&start=50&count=25');
        });
    });
});
