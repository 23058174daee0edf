/**
 * Error taxonomy. Every failure surfaced to callers is one of these,
 * so the CLI (or any other front end) can switch on `code`.
 */
export type ErrorCode =
    | 'CONFIG'
    | 'QUERY'
    | 'REQUEST'
    | 'RATE_LIMITED'
    | 'MALFORMED_RESPONSE'
    | 'TIMEOUT';

export abstract class BibliometricsError extends Error {
    abstract readonly code: ErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Missing or invalid credential / configuration value.
 */
export class ConfigError extends BibliometricsError {
    readonly code = 'CONFIG' as const;

    constructor(message: string, public readonly issues: string[] = []) {
        super(message);
    }
}

/**
 * Search criteria that cannot be turned into a query.
 */
export class QueryError extends BibliometricsError {
    readonly code = 'QUERY' as const;
}

/**
 * Network failure or non-2xx HTTP status. `status` is 0 for network errors.
 */
export class RequestError extends BibliometricsError {
    readonly code = 'REQUEST' as const;

    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/**
 * The API reported throttling (HTTP 429).
 */
export class RateLimitedError extends BibliometricsError {
    readonly code = 'RATE_LIMITED' as const;

    constructor(message: string, public readonly retryAfterMs: number | null = null) {
        super(message);
    }
}

/**
 * The response body was not JSON, or not the envelope we expect.
 */
export class MalformedResponseError extends BibliometricsError {
    readonly code = 'MALFORMED_RESPONSE' as const;

    constructor(message: string, public readonly issues: string[] = [], options?: { cause?: unknown }) {
        super(message, options);
    }
}

/**
 * A single request exceeded the configured timeout.
 */
export class TimeoutError extends BibliometricsError {
    readonly code = 'TIMEOUT' as const;

    constructor(message: string, public readonly timeoutMs: number) {
        super(message);
    }
}
