import { writeFileSync } from 'node:fs';
import { recordsOf, type DocumentRecord, type ResultSet } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { toCsv } from './csv.js';
import { toXlsx } from './xlsx.js';

// ─── Types ───────────────────────────────────────────────

export type ExportFormat = 'csv' | 'xlsx';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'xlsx'];

// ─── Main Export Functions ───────────────────────────────

/**
 * Serialize records in the requested tabular format.
 * Same input, same bytes.
 */
export async function exportResultSet(
    input: ResultSet | readonly DocumentRecord[],
    format: ExportFormat
): Promise<Buffer> {
    const records = recordsOf(input);

    switch (format) {
        case 'csv':
            return Buffer.from(toCsv(records), 'utf-8');
        case 'xlsx':
            return toXlsx(records);
        default:
            throw new Error(`Unsupported export format: ${String(format)}`);
    }
}

/**
 * Export to a file on disk.
 */
export async function writeExport(
    input: ResultSet | readonly DocumentRecord[],
    format: ExportFormat,
    outputPath: string
): Promise<void> {
    const content = await exportResultSet(input, format);
    writeFileSync(outputPath, content);
    getLogger().info({ format, outputPath, bytes: content.length }, 'Result set exported');
}

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((format) => format === value);
}
