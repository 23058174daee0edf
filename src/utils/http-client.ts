import { getLogger } from './logger.js';
import { MalformedResponseError, RateLimitedError, RequestError, TimeoutError } from './errors.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Wait until a token is available
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        await sleep(waitMs);
        this.refill();
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

/**
 * Per-source rate limit configurations.
 */
const RATE_LIMITS: Record<string, { tokensPerSecond: number; maxBurst: number }> = {
    scopus: { tokensPerSecond: 9, maxBurst: 9 },  // Search API throttles above ~9/s per key
};
const DEFAULT_RATE_LIMIT = { tokensPerSecond: 5, maxBurst: 5 };

export interface HttpClientOptions {
    /** Per-request timeout in milliseconds */
    timeout?: number;
    /** Extra attempts for retryable failures (0 = fail on the first one) */
    retries?: number;
    version?: string;
}

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
    source?: string;  // For per-source rate limiting
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

/**
 * Centralized HTTP client with per-source rate limiting and optional retry.
 * Requests are issued one at a time by callers; nothing here runs in parallel.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly maxRetries: number;
    private readonly userAgent: string;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        this.maxRetries = Math.max(0, options?.retries ?? 0);
        const version = options?.version ?? '1.0.0';
        this.userAgent = `scopus-bibliometrics/${version}`;
    }

    /**
     * GET a JSON resource with rate limiting, timeout and (optional) retry.
     * The body is returned as `unknown`; callers validate its shape.
     */
    async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<unknown>> {
        const {
            headers = {},
            timeout = this.defaultTimeout,
            source = 'default',
        } = options;

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        const initialBackoff = 1000;
        const maxBackoff = 30000;

        for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
            await this.getBucket(source).acquire();
            this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);

            let response: Response;
            try {
                response = await fetch(url, {
                    method: 'GET',
                    headers: requestHeaders,
                    signal: controller.signal,
                });
            } catch (error) {
                clearTimeout(timeoutId);

                if (controller.signal.aborted) {
                    throw new TimeoutError(`Request timeout after ${timeout}ms: ${redactUrl(url)}`, timeout);
                }

                const errorCode = errorCodeOf(error);
                const retryable = errorCode ? RETRYABLE_ERROR_CODES.has(errorCode) : false;

                if (retryable && attempt < this.maxRetries) {
                    const backoff = calculateBackoff(attempt, initialBackoff, maxBackoff);
                    getLogger().warn(
                        { errorCode, attempt: attempt + 1, backoffMs: backoff, url: redactUrl(url) },
                        'Retryable network error, backing off'
                    );
                    await sleep(backoff);
                    continue;
                }

                throw new RequestError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable,
                    undefined,
                    { cause: error }
                );
            }

            try {
                const data = await readBody(response, response.ok);

                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });

                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);
                    const retryAfter = parseRetryAfter(response.headers.get('retry-after'));

                    if (retryable && attempt < this.maxRetries) {
                        const backoff = Math.min(maxBackoff, retryAfter ?? calculateBackoff(attempt, initialBackoff, maxBackoff));
                        getLogger().warn(
                            { status: response.status, attempt: attempt + 1, backoffMs: backoff, url: redactUrl(url) },
                            'Retryable HTTP error, backing off'
                        );
                        await sleep(backoff);
                        continue;
                    }

                    if (response.status === 429) {
                        throw new RateLimitedError(`Rate limited by ${source} (HTTP 429)`, retryAfter);
                    }

                    throw new RequestError(
                        `HTTP ${response.status}: ${response.statusText}`,
                        response.status,
                        retryable,
                        data
                    );
                }

                return { status: response.status, headers: responseHeaders, data, ok: true };
            } catch (error) {
                if (controller.signal.aborted && !(error instanceof RequestError || error instanceof RateLimitedError)) {
                    throw new TimeoutError(`Request timeout after ${timeout}ms: ${redactUrl(url)}`, timeout);
                }
                throw error;
            } finally {
                clearTimeout(timeoutId);
            }
        }

        throw new RequestError(`Max retries exceeded for ${redactUrl(url)}`, 0, false);
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = RATE_LIMITS[source] ?? DEFAULT_RATE_LIMIT;
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }
}

/**
 * JSON bodies are parsed; anything else comes back as text.
 * Error responses fall back to text when their JSON is broken.
 */
async function readBody(response: Response, strict: boolean): Promise<unknown> {
    const contentType = response.headers.get('content-type') ?? '';
    if (!contentType.includes('json')) {
        return response.text();
    }

    const text = await response.text();
    if (text.trim() === '') return null;

    try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
    } catch (error) {
        if (!strict) return text;
        throw new MalformedResponseError(
            `Response declared ${contentType} but is not valid JSON`,
            [],
            { cause: error }
        );
    }
}

function errorCodeOf(error: unknown): string | undefined {
    // undici wraps socket errors: TypeError('fetch failed', { cause: { code } })
    for (const candidate of [error, error instanceof Error ? error.cause : undefined]) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate) {
            const { code } = candidate;
            if (typeof code === 'string') return code;
        }
    }
    return undefined;
}

export function parseRetryAfter(header: string | null | undefined): number | null {
    if (!header) return null;

    // Try parsing as seconds
    const seconds = parseInt(header, 10);
    if (!isNaN(seconds)) return seconds * 1000;

    // Try parsing as HTTP date
    const date = new Date(header);
    if (!isNaN(date.getTime())) {
        return Math.max(0, date.getTime() - Date.now());
    }

    return null;
}

function calculateBackoff(attempt: number, initial: number, max: number): number {
    // Exponential backoff with jitter
    const exponential = initial * Math.pow(2, attempt);
    const jitter = Math.random() * exponential * 0.5;
    return Math.min(max, exponential + jitter);
}

/**
 * Drop credentials that some APIs accept as query parameters.
 */
export function redactUrl(url: string): string {
    return url.replace(/([?&](?:apiKey|api_key|insttoken)=)[^&]*/gi, '$1***');
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance.
 */
export function getHttpClient(options?: HttpClientOptions): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
