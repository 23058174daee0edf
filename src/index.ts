/**
 * Library entry point: search → summarize → export.
 */
export { search, createSearch, type SearchOptions } from './builder/search.js';
export { summarize } from './stats/aggregator.js';
export { exportResultSet, writeExport, EXPORT_FORMATS, isExportFormat, type ExportFormat } from './exporters/export.js';
export { toCsv, parseCsv, recordsFromCsv } from './exporters/csv.js';
export { buildQuery, buildRequestParams, freezeQuery } from './query/query-builder.js';
export { ScopusFetcher, type ScopusPage } from './sources/scopus.js';
export { normalizeEntry, normalizeEntries } from './sources/normalize.js';
export { formatSummary } from './report/format-summary.js';
export { resolveConfig, requireApiKey } from './utils/config.js';
export { HttpClient, createHttpClient } from './utils/http-client.js';
export * from './utils/errors.js';
export * from './types/index.js';
