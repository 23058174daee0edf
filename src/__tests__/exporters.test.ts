import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import JSZip from 'jszip';
import { toCsv, parseCsv, recordsFromCsv } from '../exporters/csv.js';
import { toXlsx, buildSheetXml, columnLetter, SHEET_NAME } from '../exporters/xlsx.js';
import { exportResultSet, writeExport, isExportFormat } from '../exporters/export.js';
import type { ResultSet } from '../types/index.js';
import { makeRecord } from './helpers.js';

const HEADER = 'id,title,authors,year,venue,citation_count,document_type,doi,url';

const records = [
    makeRecord({
        id: 'SCOPUS_ID:1',
        title: 'AI, "Libraries"',
        authors: ['Silva, A', 'Costa, B'],
        year: 2020,
        citationCount: 5,
        doi: '10.1000/xyz',
    }),
    makeRecord({
        id: 'SCOPUS_ID:2',
        title: 'AI in Museums',
        authors: ['Silva, A'],
        year: 2021,
        venue: 'Museum Journal',
        documentType: 'Article',
        url: 'https://api.elsevier.com/content/abstract/scopus_id/2',
    }),
];

describe('Exporters', () => {
    describe('CSV', () => {
        it('should write a header and one quoted-where-needed row per record', () => {
            expect(toCsv(records)).toBe([
                HEADER,
                'SCOPUS_ID:1,"AI, ""Libraries""","Silva, A; Costa, B",2020,,5,,10.1000/xyz,',
                'SCOPUS_ID:2,AI in Museums,"Silva, A",2021,Museum Journal,0,Article,,https://api.elsevier.com/content/abstract/scopus_id/2',
                '',
            ].join('\n'));
        });

        it('should write only the header for an empty result set', () => {
            expect(toCsv([])).toBe(`${HEADER}\n`);
        });

        it('should read back the records it wrote', () => {
            expect(recordsFromCsv(toCsv(records))).toEqual(records);
        });

        it('should keep line breaks inside quoted fields', () => {
            const multiline = [makeRecord({ id: 'x', title: 'Line one\nline two' })];
            expect(recordsFromCsv(toCsv(multiline))[0]?.title).toBe('Line one\nline two');
        });

        it('should parse CRLF line endings and a byte order mark', () => {
            expect(parseCsv('\uFEFFa,b\r\n1,"2"\r\n')).toEqual([['a', 'b'], ['1', '2']]);
        });

        it('should reject an unterminated quoted field', () => {
            expect(() => parseCsv('a,"b\n')).toThrow(SyntaxError);
        });

        it('should match columns by name and skip blank lines', () => {
            const text = 'title,id,authors,year,venue,citation_count,document_type,doi,url\n'
                + 'Some title,abc,,1999,,7,,,\n'
                + '\n';

            expect(recordsFromCsv(text)).toEqual([
                makeRecord({ id: 'abc', title: 'Some title', year: 1999, citationCount: 7 }),
            ]);
        });

        it('should report missing columns', () => {
            expect(() => recordsFromCsv('id,title\n1,x\n'))
                .toThrow('CSV is missing columns: authors, year, venue, citation_count, document_type, doi, url');
        });
    });

    describe('XLSX', () => {
        it('should convert column indexes to letters', () => {
            expect(columnLetter(0)).toBe('A');
            expect(columnLetter(25)).toBe('Z');
            expect(columnLetter(26)).toBe('AA');
            expect(columnLetter(701)).toBe('ZZ');
            expect(columnLetter(702)).toBe('AAA');
        });

        it('should write typed cells and omit unknown values', () => {
            const lines = buildSheetXml([
                makeRecord({ id: 'x', title: 'A & B <c>', year: 2021 }),
            ]).split('\n');

            expect(lines[3]).toBe(
                '    <row r="1">'
                + '<c r="A1" t="inlineStr"><is><t xml:space="preserve">id</t></is></c>'
                + '<c r="B1" t="inlineStr"><is><t xml:space="preserve">title</t></is></c>'
                + '<c r="C1" t="inlineStr"><is><t xml:space="preserve">authors</t></is></c>'
                + '<c r="D1" t="inlineStr"><is><t xml:space="preserve">year</t></is></c>'
                + '<c r="E1" t="inlineStr"><is><t xml:space="preserve">venue</t></is></c>'
                + '<c r="F1" t="inlineStr"><is><t xml:space="preserve">citation_count</t></is></c>'
                + '<c r="G1" t="inlineStr"><is><t xml:space="preserve">document_type</t></is></c>'
                + '<c r="H1" t="inlineStr"><is><t xml:space="preserve">doi</t></is></c>'
                + '<c r="I1" t="inlineStr"><is><t xml:space="preserve">url</t></is></c>'
                + '</row>'
            );
            expect(lines[4]).toBe(
                '    <row r="2">'
                + '<c r="A2" t="inlineStr"><is><t xml:space="preserve">x</t></is></c>'
                + '<c r="B2" t="inlineStr"><is><t xml:space="preserve">A &amp; B &lt;c&gt;</t></is></c>'
                + '<c r="C2" t="inlineStr"><is><t xml:space="preserve"></t></is></c>'
                + '<c r="D2"><v>2021</v></c>'
                + '<c r="F2"><v>0</v></c>'
                + '</row>'
            );
        });

        it('should strip characters XML cannot carry', () => {
            const xml = buildSheetXml([makeRecord({ id: 'bell\u0007' })]);
            expect(xml).toContain('<t xml:space="preserve">bell</t>');
        });

        it('should produce identical bytes for identical input', async () => {
            const first = await toXlsx(records);
            const second = await toXlsx(records);

            expect(first.equals(second)).toBe(true);
        });

        it('should produce a workbook with one named sheet', async () => {
            const zip = await JSZip.loadAsync(await toXlsx(records));

            expect(zip.file(/./).map((file) => file.name).sort()).toEqual([
                '[Content_Types].xml',
                '_rels/.rels',
                'xl/_rels/workbook.xml.rels',
                'xl/workbook.xml',
                'xl/worksheets/sheet1.xml',
            ]);

            const workbook = await zip.file('xl/workbook.xml')?.async('string');
            expect(workbook).toContain(`<sheet name="${SHEET_NAME}" sheetId="1" r:id="rId1"/>`);

            const sheet = await zip.file('xl/worksheets/sheet1.xml')?.async('string');
            expect(sheet).toBe(buildSheetXml(records));
        });
    });

    describe('exportResultSet', () => {
        const resultSet: ResultSet = { query: 'TITLE(ai)', totalAvailable: 2, records, skipped: 0, duplicates: 0 };

        it('should accept a result set or bare records', async () => {
            const fromSet = await exportResultSet(resultSet, 'csv');
            const fromRecords = await exportResultSet(records, 'csv');

            expect(fromSet.toString('utf-8')).toBe(toCsv(records));
            expect(fromSet.equals(fromRecords)).toBe(true);
        });

        it('should recognise supported formats', () => {
            expect(isExportFormat('csv')).toBe(true);
            expect(isExportFormat('xlsx')).toBe(true);
            expect(isExportFormat('json')).toBe(false);
        });

        describe('writeExport', () => {
            let dir: string | undefined;

            afterEach(() => {
                if (dir) rmSync(dir, { recursive: true, force: true });
                dir = undefined;
            });

            it('should write the exported bytes to disk', async () => {
                dir = mkdtempSync(join(tmpdir(), 'bibliometrics-'));
                const csvPath = join(dir, 'out.csv');
                const xlsxPath = join(dir, 'out.xlsx');

                await writeExport(resultSet, 'csv', csvPath);
                await writeExport(resultSet, 'xlsx', xlsxPath);

                expect(readFileSync(csvPath, 'utf-8')).toBe(toCsv(records));
                expect(readFileSync(xlsxPath).equals(await toXlsx(records))).toBe(true);
            });
        });
    });
});
