import type { FrequencyEntry, Summary } from '../types/index.js';

export interface ReportContext {
    /** Matches the API reported for the query */
    totalAvailable?: number;
    skipped?: number;
}

/**
 * Render a summary as a plain-text report for the terminal.
 */
export function formatSummary(summary: Summary, context: ReportContext = {}): string {
    const lines: string[] = ['', '📊 Bibliometric Summary', ''];

    const period = summary.yearRange
        ? `${summary.yearRange.first} - ${summary.yearRange.last}`
        : '-';

    lines.push(metric('Documents', summary.totalCount));
    if (context.totalAvailable !== undefined) {
        lines.push(metric('Matches in Scopus', context.totalAvailable));
    }
    if (context.skipped) {
        lines.push(metric('Skipped entries', context.skipped));
    }
    lines.push(metric('Total citations', summary.totalCitations));
    lines.push(metric('Mean citations', summary.averageCitations.toFixed(2)));
    lines.push(metric('Period', period));

    if (summary.countsByYear.length > 0 || summary.unknownYearCount > 0) {
        lines.push('', '  Publications per year:');
        for (const { year, count } of summary.countsByYear) {
            lines.push(`    ${year}: ${count}`);
        }
        if (summary.unknownYearCount > 0) {
            lines.push(`    unknown: ${summary.unknownYearCount}`);
        }
    }

    appendTable(lines, 'Top authors', summary.topAuthors);
    appendTable(lines, 'Top venues', summary.topVenues);
    appendTable(lines, 'Top title terms', summary.topTerms);

    lines.push('');
    return lines.join('\n');
}

function metric(label: string, value: string | number): string {
    return `  ${`${label}:`.padEnd(19)}${value}`;
}

function appendTable(lines: string[], title: string, entries: FrequencyEntry[]): void {
    if (entries.length === 0) return;

    lines.push('', `  ${title}:`);
    const width = String(entries[0]?.count ?? 0).length;
    for (const { value, count } of entries) {
        lines.push(`    ${String(count).padStart(width)}  ${value}`);
    }
}
