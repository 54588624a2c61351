import type { ContinuationTokens, FetchResult, SortOrder, SubmitResult } from './article.js';

/**
 * Per-call controls for remote operations.
 */
export interface CallOptions {
    /** Caller deadline; aborting yields a timeout TransportError */
    signal?: AbortSignal;

    /** Overrides the client's default request timeout */
    timeoutMs?: number;
}

export interface FetchOptions extends CallOptions {
    /** Total match count already known from the submit phase */
    totalCount?: number;
}

/**
 * The two-phase search protocol plus related-record lookup.
 * Implemented by the E-utilities client; substituted by fakes in tests.
 */
export interface SearchSource {
    /** Phase one: run the query, keep history server-side. */
    submit(query: string, pageSize: number, offset: number, sort?: SortOrder, options?: CallOptions): Promise<SubmitResult>;

    /** Phase two: page through a submitted query by its history handle. */
    fetch(tokens: ContinuationTokens, pageSize: number, offset: number, options?: FetchOptions): Promise<FetchResult>;

    /** Phase two without a history handle. */
    fetchByIds(ids: string[], options?: CallOptions): Promise<FetchResult>;

    /** Records linked to `id` by the service's similarity index. */
    related(id: string, maxResults: number, options?: CallOptions): Promise<FetchResult>;
}

/**
 * Connection settings for the E-utilities service.
 */
export interface SourceAdapterOptions {
    baseUrl: string;

    /** Registered tool name, sent with every request */
    tool: string;

    /** Contact address, sent with every request */
    email: string;

    /** Raises the allowed request rate when present */
    apiKey?: string;
}
