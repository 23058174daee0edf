import type { DocumentRecord } from '../types/index.js';

export const AUTHOR_SEPARATOR = '; ';

export type CellValue = string | number | null;

/**
 * Fixed column order shared by every tabular format.
 */
export const COLUMNS = [
    'id',
    'title',
    'authors',
    'year',
    'venue',
    'citation_count',
    'document_type',
    'doi',
    'url',
] as const;

export type ColumnName = (typeof COLUMNS)[number];

/**
 * Flatten a record into cells in `COLUMNS` order. Unknown values become null.
 */
export function toRow(record: DocumentRecord): CellValue[] {
    return [
        record.id,
        record.title,
        record.authors.join(AUTHOR_SEPARATOR),
        record.year,
        record.venue,
        record.citationCount,
        record.documentType,
        record.doi,
        record.url,
    ];
}
