import { describe, it, expect } from 'vitest';
import { formatSummary } from '../report/format-summary.js';
import { summarize } from '../stats/aggregator.js';
import type { Summary } from '../types/index.js';
import { makeRecord } from './helpers.js';

describe('formatSummary', () => {
    it('should render every section of a summary', () => {
        const summary = summarize([
            makeRecord({ id: '1', title: 'AI and Libraries', authors: ['Silva, A', 'Costa, B'], year: 2020, citationCount: 5 }),
            makeRecord({ id: '2', title: 'AI in Museums', authors: ['Silva, A'], year: 2021 }),
        ]);

        expect(formatSummary(summary, { totalAvailable: 2 }).split('\n')).toEqual([
            '',
            '📊 Bibliometric Summary',
            '',
            '  Documents:         2',
            '  Matches in Scopus: 2',
            '  Total citations:   5',
            '  Mean citations:    2.50',
            '  Period:            2020 - 2021',
            '',
            '  Publications per year:',
            '    2020: 1',
            '    2021: 1',
            '',
            '  Top authors:',
            '    2  Silva, A',
            '    1  Costa, B',
            '',
            '  Top title terms:',
            '    1  libraries',
            '    1  museums',
            '',
        ]);
    });

    it('should render an empty summary without tables', () => {
        expect(formatSummary(summarize([]))).toBe([
            '',
            '📊 Bibliometric Summary',
            '',
            '  Documents:         0',
            '  Total citations:   0',
            '  Mean citations:    0.00',
            '  Period:            -',
            '',
        ].join('\n'));
    });

    it('should report skipped entries and unknown years', () => {
        const summary: Summary = {
            totalCount: 14,
            totalCitations: 0,
            averageCitations: 0,
            countsByYear: [{ year: 2019, count: 13 }],
            unknownYearCount: 1,
            yearRange: { first: 2019, last: 2019 },
            topAuthors: [],
            topVenues: [
                { value: 'Scientometrics', count: 12 },
                { value: 'Library Trends', count: 2 },
            ],
            topTerms: [],
        };

        expect(formatSummary(summary, { skipped: 3 }).split('\n')).toEqual([
            '',
            '📊 Bibliometric Summary',
            '',
            '  Documents:         14',
            '  Skipped entries:   3',
            '  Total citations:   0',
            '  Mean citations:    0.00',
            '  Period:            2019 - 2019',
            '',
            '  Publications per year:',
            '    2019: 13',
            '    unknown: 1',
            '',
            '  Top venues:',
            '    12  Scientometrics',
            '     2  Library Trends',
            '',
        ]);
    });
});
