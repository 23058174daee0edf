import type {
    DocumentRecord,
    ResultSet,
    Summary,
    SummaryOptions,
    YearCount,
} from '../types/index.js';
import { DEFAULT_CONFIG, recordsOf } from '../types/index.js';
import { tokenize } from '../nlp/tokenizer.js';
import { topFrequencies } from './frequency.js';

/**
 * Compute the summary of a result set (or a bare list of records).
 *
 * Pure: the same records always yield the same summary, and nothing is
 * carried over between calls. An empty input gives zero totals and empty
 * tables rather than an error.
 */
export function summarize(
    input: ResultSet | readonly DocumentRecord[],
    options: SummaryOptions = {}
): Summary {
    const records = recordsOf(input);
    const topN = options.topN ?? DEFAULT_CONFIG.topN;
    const minTermLength = options.minTermLength ?? DEFAULT_CONFIG.minTermLength;

    const totalCount = records.length;
    const totalCitations = records.reduce((sum, record) => sum + record.citationCount, 0);
    const averageCitations = totalCount === 0 ? 0 : totalCitations / totalCount;

    const { countsByYear, unknownYearCount } = countByYear(records);
    const first = countsByYear[0];
    const last = countsByYear[countsByYear.length - 1];

    return {
        totalCount,
        totalCitations,
        averageCitations,
        countsByYear,
        unknownYearCount,
        yearRange: first && last ? { first: first.year, last: last.year } : null,
        topAuthors: topFrequencies(records.flatMap((record) => record.authors), topN),
        topVenues: topFrequencies(
            records.flatMap((record) => (record.venue ? [record.venue] : [])),
            topN
        ),
        topTerms: topFrequencies(
            records.flatMap((record) => tokenize(record.title, minTermLength)),
            topN
        ),
    };
}

function countByYear(records: readonly DocumentRecord[]): {
    countsByYear: YearCount[];
    unknownYearCount: number;
} {
    const counts = new Map<number, number>();
    let unknownYearCount = 0;

    for (const record of records) {
        if (record.year === null) {
            unknownYearCount++;
        } else {
            counts.set(record.year, (counts.get(record.year) ?? 0) + 1);
        }
    }

    const countsByYear = [...counts.entries()]
        .map(([year, count]) => ({ year, count }))
        .sort((a, b) => a.year - b.year);

    return { countsByYear, unknownYearCount };
}
