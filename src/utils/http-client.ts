import { getLogger } from './logger.js';
import { RateLimitExceededError, TransportError } from './errors.js';
import { NoopRateGovernor, type RateGovernor } from './rate-governor.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * Query parameters. Undefined values are dropped.
 */
export type QueryParams = Record<string, string | number | undefined>;

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
    signal?: AbortSignal;
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    data: string;
    ok: boolean;
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;

    /** Parameters appended to every request (tool, email, api_key) */
    defaultParams?: QueryParams;

    governor?: RateGovernor;
}

/**
 * HTTP GET client for a single rate-limited service.
 * Every request waits on the governor first; nothing is retried here.
 */
export class HttpClient {
    private requestCount = 0;
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly defaultParams: QueryParams;
    private readonly governor: RateGovernor;

    constructor(options: HttpClientOptions = {}) {
        this.defaultTimeout = options.timeout ?? 30000;
        const version = options.version ?? '1.0.0';
        const email = options.email ?? 'pubtrail@example.com';
        this.userAgent = `pubtrail/${version} (mailto:${email})`;
        this.defaultParams = options.defaultParams ?? {};
        this.governor = options.governor ?? new NoopRateGovernor();
    }

    /**
     * GET `url` with `params` merged over the default parameters.
     * Throws TransportError on network failure, timeout, or non-2xx status.
     */
    async get(url: string, params: QueryParams = {}, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const { headers = {}, timeout = this.defaultTimeout, signal } = options;
        const fullUrl = buildUrl(url, { ...this.defaultParams, ...params });

        try {
            await this.governor.acquire(signal);
        } catch (error) {
            throw cancelled(fullUrl, error);
        }
        // Slot is consumed even if the request then times out
        this.requestCount++;

        getLogger().debug({ url: redactUrl(fullUrl) }, 'GET');

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);
        const onCallerAbort = (): void => controller.abort();
        if (signal?.aborted) {
            controller.abort();
        } else {
            signal?.addEventListener('abort', onCallerAbort, { once: true });
        }

        try {
            const response = await fetch(fullUrl, {
                method: 'GET',
                headers: { 'User-Agent': this.userAgent, ...headers },
                signal: controller.signal,
            });

            const data = await response.text();

            // Build headers map
            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            if (!response.ok) {
                if (response.status === 429) {
                    throw new RateLimitExceededError(redactUrl(fullUrl), parseRetryAfter(response.headers.get('retry-after')));
                }
                throw new TransportError(`HTTP ${response.status}: ${response.statusText}`, {
                    kind: 'status',
                    status: response.status,
                    retryable: RETRYABLE_STATUS_CODES.has(response.status),
                    url: redactUrl(fullUrl),
                });
            }

            return { status: response.status, headers: responseHeaders, data, ok: true };
        } catch (error) {
            if (error instanceof TransportError) throw error;

            if (signal?.aborted) {
                throw cancelled(fullUrl, error);
            }
            if (controller.signal.aborted) {
                throw new TransportError(`Request timeout after ${timeout}ms: ${redactUrl(fullUrl)}`, {
                    kind: 'timeout',
                    retryable: true,
                    url: redactUrl(fullUrl),
                    cause: error,
                });
            }

            const code = errorCode(error);
            throw new TransportError(`Network error: ${error instanceof Error ? error.message : String(error)}`, {
                kind: 'network',
                retryable: code !== undefined && RETRYABLE_ERROR_CODES.has(code),
                url: redactUrl(fullUrl),
                cause: error,
            });
        } finally {
            clearTimeout(timeoutId);
            signal?.removeEventListener('abort', onCallerAbort);
        }
    }

    getRequestCount(): number {
        return this.requestCount;
    }

    resetCounts(): void {
        this.requestCount = 0;
    }
}

export function buildUrl(base: string, params: QueryParams): string {
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) search.append(key, String(value));
    }
    const query = search.toString();
    return query ? `${base}?${query}` : base;
}

/**
 * Hide credentials before a URL reaches logs or error messages.
 */
export function redactUrl(url: string): string {
    return url.replace(/([?&]api_key=)[^&]*/g, '$1***');
}

/**
 * Retry-After as milliseconds; accepts seconds or an HTTP date.
 */
export function parseRetryAfter(header: string | null): number | null {
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

function cancelled(url: string, cause: unknown): TransportError {
    return new TransportError(`Request cancelled: ${redactUrl(url)}`, {
        kind: 'cancelled',
        retryable: false,
        url: redactUrl(url),
        cause,
    });
}

/**
 * System error code of a failed fetch. undici wraps it in `cause`.
 */
function errorCode(error: unknown): string | undefined {
    let current: unknown = error;
    for (let depth = 0; depth < 3; depth++) {
        if (typeof current !== 'object' || current === null) break;
        if ('code' in current && typeof current.code === 'string') return current.code;
        current = 'cause' in current ? current.cause : undefined;
    }
    return undefined;
}
