import type { DocumentRecord } from '../types/index.js';
import { AUTHOR_SEPARATOR, COLUMNS, toRow, type CellValue } from './columns.js';

/**
 * Serialize records as RFC 4180 CSV with a header row and `\n` line endings.
 */
export function toCsv(records: readonly DocumentRecord[]): string {
    let csv = COLUMNS.join(',') + '\n';
    for (const record of records) {
        csv += toRow(record).map(escapeCell).join(',') + '\n';
    }
    return csv;
}

function escapeCell(value: CellValue): string {
    if (value === null) return '';
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Parse CSV text into rows of fields (quoted fields may span lines).
 */
export function parseCsv(text: string): string[][] {
    const rows: string[][] = [];
    let row: string[] = [];
    let field = '';
    let quoted = false;
    let i = 0;

    const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

    while (i < input.length) {
        const char = input[i];

        if (quoted) {
            if (char === '"') {
                if (input[i + 1] === '"') {
                    field += '"';
                    i += 2;
                    continue;
                }
                quoted = false;
            } else {
                field += char;
            }
            i++;
            continue;
        }

        if (char === '"' && field === '') {
            quoted = true;
        } else if (char === ',') {
            row.push(field);
            field = '';
        } else if (char === '\n' || char === '\r') {
            if (char === '\r' && input[i + 1] === '\n') i++;
            row.push(field);
            rows.push(row);
            row = [];
            field = '';
        } else {
            field += char;
        }
        i++;
    }

    if (quoted) {
        throw new SyntaxError('Unterminated quoted field in CSV input');
    }
    if (field !== '' || row.length > 0) {
        row.push(field);
        rows.push(row);
    }

    return rows;
}

/**
 * Read records back from a file produced by `toCsv`.
 * Columns are matched by header name, so reordered files also load.
 */
export function recordsFromCsv(text: string): DocumentRecord[] {
    const [header, ...rows] = parseCsv(text);
    if (!header) return [];

    const index = new Map(header.map((name, position) => [name.trim(), position]));
    const missing = COLUMNS.filter((column) => !index.has(column));
    if (missing.length > 0) {
        throw new SyntaxError(`CSV is missing columns: ${missing.join(', ')}`);
    }

    const cell = (row: string[], column: (typeof COLUMNS)[number]): string => {
        const position = index.get(column);
        return position === undefined ? '' : (row[position] ?? '');
    };
    const optional = (value: string): string | null => (value === '' ? null : value);

    return rows
        .filter((row) => row.some((value) => value !== ''))
        .map((row) => {
            const year = Number.parseInt(cell(row, 'year'), 10);
            const citations = Number.parseInt(cell(row, 'citation_count'), 10);
            const authors = cell(row, 'authors');

            return {
                id: cell(row, 'id'),
                title: cell(row, 'title'),
                authors: authors === '' ? [] : authors.split(AUTHOR_SEPARATOR),
                year: Number.isNaN(year) ? null : year,
                venue: optional(cell(row, 'venue')),
                citationCount: Number.isNaN(citations) ? 0 : Math.max(0, citations),
                documentType: optional(cell(row, 'document_type')),
                doi: optional(cell(row, 'doi')),
                url: optional(cell(row, 'url')),
            };
        });
}
