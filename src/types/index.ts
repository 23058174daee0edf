/**
 * Barrel export for all shared types.
 */
export type { SearchQuery, RawRecord, DocumentRecord, ResultSet } from './record.js';
export { recordsOf } from './record.js';
export type { Summary, SummaryOptions, FrequencyEntry, YearCount } from './summary.js';
export { DEFAULT_CONFIG, MAX_PAGE_SIZE } from './config.js';
export type { AppConfig, LogLevel } from './config.js';
