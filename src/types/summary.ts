/**
 * One row of a top-N frequency table.
 */
export interface FrequencyEntry {
    value: string;
    count: number;
}

export interface YearCount {
    year: number;
    count: number;
}

/**
 * Descriptive statistics derived from a result set.
 * Always recomputed from scratch; never updated in place.
 */
export interface Summary {
    totalCount: number;
    totalCitations: number;
    averageCitations: number;

    /** Ascending by year; records without a year are left out */
    countsByYear: YearCount[];
    unknownYearCount: number;
    yearRange: { first: number; last: number } | null;

    topAuthors: FrequencyEntry[];
    topVenues: FrequencyEntry[];
    topTerms: FrequencyEntry[];
}

export interface SummaryOptions {
    /** Maximum rows per top-N table */
    topN?: number;

    /** Shortest title token counted as a term */
    minTermLength?: number;
}
