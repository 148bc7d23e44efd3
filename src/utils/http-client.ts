import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * Backends the client talks to; each has its own rate limit.
 */
export type HttpSource = 'lookup' | 'sparql' | 'embeddings' | 'default';

export interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * Per-source rate limits, per client (i.e. per worker).
 */
export const DEFAULT_RATE_LIMITS: Record<HttpSource, RateLimit> = {
    lookup: { tokensPerSecond: 10, maxBurst: 10 },
    sparql: { tokensPerSecond: 5, maxBurst: 5 },
    embeddings: { tokensPerSecond: 50, maxBurst: 50 },  // Usually a local service
    default: { tokensPerSecond: 5, maxBurst: 5 },
};

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(private readonly limit: RateLimit) {
        this.tokens = limit.maxBurst;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens < 1) {
            // Reserve the token now so concurrent callers queue behind each other
            const waitMs = ((1 - this.tokens) / this.limit.tokensPerSecond) * 1000;
            this.tokens -= 1;
            await sleep(waitMs);
            return;
        }

        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.limit.maxBurst, this.tokens + elapsed * this.limit.tokensPerSecond);
        this.lastRefill = now;
    }
}

/**
 * Query string values; arrays repeat the parameter (`?uri=a&uri=b`).
 */
export type QueryParams = Record<string, string | number | readonly string[] | undefined>;

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    query?: QueryParams;
    headers?: Record<string, string>;
    body?: string | object;
    timeout?: number;
    source?: HttpSource;
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
 * HTTP error with classification.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    maxRetries?: number;
    initialBackoffMs?: number;
    rateLimits?: Partial<Record<HttpSource, RateLimit>>;
}

/**
 * Append query parameters to a URL, repeating array values.
 */
export function buildUrl(base: string, query?: QueryParams): string {
    if (!query) return base;

    const params = new URLSearchParams();
    for (const [name, value] of Object.entries(query)) {
        if (value === undefined) continue;
        if (typeof value === 'string' || typeof value === 'number') {
            params.append(name, String(value));
        } else {
            for (const item of value) params.append(name, item);
        }
    }

    const qs = params.toString();
    if (!qs) return base;
    return `${base}${base.includes('?') ? '&' : '?'}${qs}`;
}

function errorCode(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    if ('code' in error && typeof error.code === 'string') return error.code;
    // undici wraps socket errors: TypeError('fetch failed', { cause })
    const cause: unknown = error.cause;
    if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') return cause.code;
    return undefined;
}

/**
 * fetch-based HTTP client with per-source rate limiting and retries.
 * Generators build one client per worker.
 */
export class HttpClient {
    private buckets = new Map<HttpSource, TokenBucket>();
    private requestCounts = new Map<HttpSource, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly maxRetries: number;
    private readonly initialBackoffMs: number;
    private readonly rateLimits: Record<HttpSource, RateLimit>;

    constructor(options: HttpClientOptions = {}) {
        this.defaultTimeout = options.timeout ?? 30000;
        this.userAgent = `cellink/${options.version ?? '1.0.0'}`;
        this.maxRetries = options.maxRetries ?? 3;
        this.initialBackoffMs = options.initialBackoffMs ?? 1000;
        this.rateLimits = { ...DEFAULT_RATE_LIMITS, ...options.rateLimits };
    }

    /**
     * Make an HTTP request with rate limiting and retry.
     * JSON responses are parsed; anything else is returned as text.
     */
    async request<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const {
            method = 'GET',
            headers = {},
            body,
            timeout = this.defaultTimeout,
            source = 'default',
        } = options;
        const fullUrl = buildUrl(url, options.query);
        const logger = getLogger();

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            Accept: 'application/json',
            ...headers,
        };

        let requestBody: string | undefined;
        if (typeof body === 'object') {
            requestBody = JSON.stringify(body);
            requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
        } else {
            requestBody = body;
        }

        const maxBackoff = 30000;

        for (let attempt = 0; ; attempt++) {
            await this.getBucket(source).acquire();
            this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

            let response: Response;
            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);
            try {
                response = await fetch(fullUrl, {
                    method,
                    headers: requestHeaders,
                    body: requestBody,
                    signal: controller.signal,
                });
            } catch (error) {
                const code = errorCode(error);
                const retryable = code !== undefined && RETRYABLE_ERROR_CODES.has(code);

                if (retryable && attempt < this.maxRetries) {
                    const backoff = this.calculateBackoff(attempt, maxBackoff);
                    logger.warn({ errorCode: code, attempt: attempt + 1, backoffMs: backoff, url }, 'Retryable network error, backing off');
                    await sleep(backoff);
                    continue;
                }

                if (error instanceof Error && error.name === 'AbortError') {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
                }

                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            } finally {
                clearTimeout(timeoutId);
            }

            const data = await this.parseBody<T>(response);

            if (!response.ok) {
                const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                if (retryable && attempt < this.maxRetries) {
                    const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                    const backoff = retryAfter ?? this.calculateBackoff(attempt, maxBackoff);

                    logger.warn(
                        { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                        'Retryable HTTP error, backing off'
                    );
                    await sleep(backoff);
                    continue;
                }

                throw new HttpError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    response.status,
                    retryable,
                    data
                );
            }

            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            return { status: response.status, headers: responseHeaders, data, ok: true };
        }
    }

    /**
     * Convenience method for GET requests.
     */
    async get<T = unknown>(url: string, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'GET' });
    }

    /**
     * Convenience method for POST requests.
     */
    async post<T = unknown>(url: string, body: string | object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'POST', body });
    }

    /**
     * Get request count for a source, retries included.
     */
    getRequestCount(source: HttpSource): number {
        return this.requestCounts.get(source) ?? 0;
    }

    private async parseBody<T>(response: Response): Promise<T> {
        const contentType = response.headers.get('content-type') ?? '';
        if (contentType.includes('json')) {
            return (await response.json()) as T;
        }
        return (await response.text()) as T;
    }

    private getBucket(source: HttpSource): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            bucket = new TokenBucket(this.rateLimits[source]);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }

    private parseRetryAfter(header: string | null): number | null {
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

    private calculateBackoff(attempt: number, max: number): number {
        // Exponential backoff with jitter
        const exponential = this.initialBackoffMs * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(max, exponential + jitter);
    }
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
