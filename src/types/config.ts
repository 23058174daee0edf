/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Largest `count` the Scopus Search API accepts per page.
 */
export const MAX_PAGE_SIZE = 200;

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface AppConfig {
    // Credential: only ever taken from flags or the environment
    apiKey?: string;

    // Source
    apiUrl: string;
    pageSize: number;
    maxRecords?: number;
    timeoutMs: number;
    retries: number;

    // Statistics
    topN: number;
    minTermLength: number;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
    apiUrl: 'https://api.elsevier.com/content/search/scopus',
    pageSize: 25,
    maxRecords: 200,
    timeoutMs: 40000,
    retries: 0,
    topN: 10,
    minTermLength: 3,
    logLevel: 'info',
    jsonLogs: false,
};
