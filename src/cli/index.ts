#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { BibliometricsError, ConfigError } from '../utils/errors.js';
import { createSearch } from '../builder/search.js';
import { summarize } from '../stats/aggregator.js';
import { writeExport } from '../exporters/export.js';
import { recordsFromCsv } from '../exporters/csv.js';
import { formatSummary } from '../report/format-summary.js';
import type { AppConfig, LogLevel, Summary } from '../types/index.js';

const VERSION = '1.0.0';

interface CommonCliOptions {
    top?: string;
    json: boolean;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface SearchCliOptions extends CommonCliOptions {
    query: string;
    yearFrom?: string;
    yearTo?: string;
    docType?: string;
    maxRecords?: string;
    pageSize?: string;
    timeout?: string;
    retries?: string;
    apiKey?: string;
    csv?: string;
    xlsx?: string;
}

interface AnalyzeCliOptions extends CommonCliOptions {
    input: string;
    xlsx?: string;
}

const program = new Command();

program
    .name('bibliometrics')
    .description('Search Scopus, summarize the results, and export them as CSV or Excel.')
    .version(VERSION);

// ─── SEARCH command ───────────────────────────────────────

program
    .command('search')
    .description('Query the Scopus Search API and summarize the matching documents')
    .requiredOption('-q, --query <expression>', 'Scopus query, e.g. \'TITLE-ABS-KEY("machine learning")\'')
    .option('--year-from <year>', 'Only documents published in or after this year')
    .option('--year-to <year>', 'Only documents published in or before this year')
    .option('--doc-type <code>', 'Scopus document type code (ar, cp, re, ...)')
    .option('-m, --max-records <n>', 'Maximum documents to collect')
    .option('--page-size <n>', 'Results per request (1-200)')
    .option('--top <n>', 'Rows per top-N table')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds')
    .option('--retries <n>', 'Retry attempts for throttled or failed requests')
    .option('--api-key <key>', 'Scopus API key (defaults to SCOPUS_API_KEY)')
    .option('--csv <path>', 'Write the result set as CSV')
    .option('--xlsx <path>', 'Write the result set as an Excel workbook')
    .option('--json', 'Print the summary as JSON', false)
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: SearchCliOptions) => {
        try {
            const config = await startup({
                ...commonFlags(opts),
                apiKey: opts.apiKey,
                maxRecords: optionalInt(opts.maxRecords),
                pageSize: optionalInt(opts.pageSize),
                timeoutMs: optionalInt(opts.timeout),
                retries: optionalInt(opts.retries),
            });

            const run = createSearch(config);
            const resultSet = await run({
                expression: opts.query,
                yearFrom: optionalInt(opts.yearFrom),
                yearTo: optionalInt(opts.yearTo),
                documentType: opts.docType,
            });

            if (opts.csv) await writeExport(resultSet, 'csv', opts.csv);
            if (opts.xlsx) await writeExport(resultSet, 'xlsx', opts.xlsx);

            const summary = summarize(resultSet, config);
            if (resultSet.records.length === 0) {
                getLogger().warn({ query: resultSet.query }, 'No documents returned for this query');
            }

            print(summary, opts.json, {
                query: resultSet.query,
                totalAvailable: resultSet.totalAvailable,
                skipped: resultSet.skipped,
                duplicates: resultSet.duplicates,
            });
        } catch (error) {
            fail('Search failed', error);
        }
    });

// ─── ANALYZE command ──────────────────────────────────────

program
    .command('analyze')
    .description('Summarize a CSV file previously written by `search --csv`')
    .requiredOption('-i, --input <path>', 'Input CSV path')
    .option('--top <n>', 'Rows per top-N table')
    .option('--xlsx <path>', 'Also convert the CSV to an Excel workbook')
    .option('--json', 'Print the summary as JSON', false)
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: AnalyzeCliOptions) => {
        try {
            const config = await startup(commonFlags(opts));

            const records = recordsFromCsv(readFileSync(opts.input, 'utf-8'));

            if (opts.xlsx) await writeExport(records, 'xlsx', opts.xlsx);

            print(summarize(records, config), opts.json, { input: opts.input });
        } catch (error) {
            fail('Analyze failed', error);
        }
    });

// ─── Helpers ──────────────────────────────────────────────

async function startup(flags: Partial<AppConfig>): Promise<Readonly<AppConfig>> {
    const config = await resolveConfig(flags);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

function commonFlags(opts: CommonCliOptions): Partial<AppConfig> {
    return {
        topN: optionalInt(opts.top),
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
    };
}

/**
 * NaN is passed through on purpose so config validation reports it.
 */
function optionalInt(value: string | undefined): number | undefined {
    return value === undefined ? undefined : Number(value);
}

function print(summary: Summary, json: boolean, meta: Record<string, unknown> & { totalAvailable?: number; skipped?: number }): void {
    if (json) {
        console.log(JSON.stringify({ ...meta, summary }, null, 2));
    } else {
        console.log(formatSummary(summary, meta));
    }
}

function fail(message: string, error: unknown): void {
    const logger = getLogger();
    if (error instanceof ConfigError) {
        logger.error({ code: error.code, issues: error.issues }, error.message);
    } else if (error instanceof BibliometricsError) {
        logger.error({ code: error.code, err: error }, `${message}: ${error.message}`);
    } else {
        logger.error({ err: error }, message);
    }
    process.exitCode = 1;
}

await program.parseAsync();
