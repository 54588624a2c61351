/**
 * Barrel export for all shared types.
 */
export { SORT_ORDERS } from './article.js';
export type { Article, ContinuationTokens, FetchResult, SubmitResult, SortOrder } from './article.js';
export type { SearchSession, SessionSummary, SessionRow } from './session.js';
export { DEFAULT_CONFIG, LOG_LEVELS, KEYED_INTERVAL_MS, ANONYMOUS_INTERVAL_MS, minIntervalFor } from './config.js';
export type { PubtrailConfig, EutilsConfig, LogLevel } from './config.js';
export type { SearchSource, SourceAdapterOptions, CallOptions, FetchOptions } from './source-adapter.js';
