import JSZip from 'jszip';
import type { DocumentRecord } from '../types/index.js';
import { COLUMNS, toRow, type CellValue } from './columns.js';

export const SHEET_NAME = 'bibliometrics';

/** Excel refuses cells longer than this */
const MAX_CELL_LENGTH = 32767;

/**
 * Every zip entry gets this timestamp so identical input gives identical bytes.
 * Kept well clear of the 1980 DOS epoch in every time zone.
 */
const FIXED_ENTRY_DATE = new Date(Date.UTC(2000, 0, 1));

const CONTENT_TYPES = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
  <Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
  <Default Extension="xml" ContentType="application/xml"/>
  <Override PartName="/xl/workbook.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.sheet.main+xml"/>
  <Override PartName="/xl/worksheets/sheet1.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.worksheet+xml"/>
</Types>`;

const ROOT_RELS = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
  <Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="xl/workbook.xml"/>
</Relationships>`;

const WORKBOOK = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<workbook xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main" xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships">
  <sheets>
    <sheet name="${SHEET_NAME}" sheetId="1" r:id="rId1"/>
  </sheets>
</workbook>`;

const WORKBOOK_RELS = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
  <Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/worksheet" Target="worksheets/sheet1.xml"/>
</Relationships>`;

/**
 * Build a single-sheet .xlsx workbook (Office Open XML) from records.
 * Strings are written inline, so no shared-strings part is needed.
 */
export async function toXlsx(records: readonly DocumentRecord[]): Promise<Buffer> {
    const zip = new JSZip();
    const entryOptions = { date: FIXED_ENTRY_DATE, createFolders: false };

    zip.file('[Content_Types].xml', CONTENT_TYPES, entryOptions);
    zip.file('_rels/.rels', ROOT_RELS, entryOptions);
    zip.file('xl/workbook.xml', WORKBOOK, entryOptions);
    zip.file('xl/_rels/workbook.xml.rels', WORKBOOK_RELS, entryOptions);
    zip.file('xl/worksheets/sheet1.xml', buildSheetXml(records), entryOptions);

    return zip.generateAsync({
        type: 'nodebuffer',
        compression: 'DEFLATE',
        compressionOptions: { level: 6 },
    });
}

/**
 * Worksheet XML: header row, then one row per record.
 */
export function buildSheetXml(records: readonly DocumentRecord[]): string {
    const rows = [
        buildRow(1, [...COLUMNS]),
        ...records.map((record, index) => buildRow(index + 2, toRow(record))),
    ];

    return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<worksheet xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main">
  <sheetData>
${rows.join('\n')}
  </sheetData>
</worksheet>`;
}

function buildRow(rowNumber: number, cells: CellValue[]): string {
    const xml = cells
        .map((value, column) => buildCell(`${columnLetter(column)}${rowNumber}`, value))
        .filter((cell) => cell !== '')
        .join('');
    return `    <row r="${rowNumber}">${xml}</row>`;
}

function buildCell(ref: string, value: CellValue): string {
    if (value === null) return '';
    if (typeof value === 'number') {
        return `<c r="${ref}"><v>${value}</v></c>`;
    }
    const text = esc(value.slice(0, MAX_CELL_LENGTH));
    return `<c r="${ref}" t="inlineStr"><is><t xml:space="preserve">${text}</t></is></c>`;
}

/**
 * Zero-based column index → spreadsheet letters (0 → A, 26 → AA).
 */
export function columnLetter(index: number): string {
    let letters = '';
    let n = index + 1;
    while (n > 0) {
        const remainder = (n - 1) % 26;
        letters = String.fromCharCode(65 + remainder) + letters;
        n = Math.floor((n - 1) / 26);
    }
    return letters;
}

function esc(s: string): string {
    return s
        // Control characters are not allowed anywhere in XML 1.0
        .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g, '')
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}
