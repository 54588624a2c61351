/**
 * Public API.
 */
export { EutilsClient, createEutilsClient, MAX_PAGE_SIZE } from './sources/eutils.js';
export { decodeArticles, decodeArticlesReport, decodeSearchResult, decodeLinkIds, decodeSpellSuggestion } from './sources/pubmed-xml.js';
export type { DecodeReport, SearchPage } from './sources/pubmed-xml.js';
export { SessionStore, SNAPSHOT_LIMIT, SNAPSHOT_TEXT_LIMIT } from './storage/session-store.js';
export { searchPage, resumeSession } from './search/pager.js';
export type { PageWindow, SearchPageOptions, ResumedPage } from './search/pager.js';
export { IntervalRateGovernor, NoopRateGovernor } from './utils/rate-governor.js';
export type { RateGovernor } from './utils/rate-governor.js';
export { HttpClient } from './utils/http-client.js';
export type { HttpClientOptions, HttpRequestOptions, HttpResponse, QueryParams } from './utils/http-client.js';
export { withRetry } from './utils/retry.js';
export type { RetryOptions } from './utils/retry.js';
export {
    PubtrailError,
    TransportError,
    RateLimitExceededError,
    StructuralError,
    NotFoundError,
    describeForUser,
} from './utils/errors.js';
export { resolveConfig } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export * from './types/index.js';
