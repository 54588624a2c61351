import type { SortOrder } from './article.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

/**
 * E-utilities connection and politeness settings.
 */
export interface EutilsConfig {
    baseUrl: string;
    tool: string;
    email: string;
    apiKey?: string;

    /**
     * Minimum gap between requests. When unset it is derived from
     * whether an API key is present (see `minIntervalFor`).
     */
    minIntervalMs?: number;

    /** Per-request timeout */
    timeoutMs: number;
}

/**
 * Full pubtrail configuration merged from CLI flags, env vars, and config file.
 */
export interface PubtrailConfig {
    eutils: EutilsConfig;

    // Storage
    db: string;
    owner: string;

    // Paging
    pageSize: number;
    sort: SortOrder;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * NCBI allows 10 requests/s with a key and 3/s without.
 */
export const KEYED_INTERVAL_MS = 100;
export const ANONYMOUS_INTERVAL_MS = 340;

export function minIntervalFor(eutils: Pick<EutilsConfig, 'apiKey' | 'minIntervalMs'>): number {
    if (eutils.minIntervalMs !== undefined) return eutils.minIntervalMs;
    return eutils.apiKey ? KEYED_INTERVAL_MS : ANONYMOUS_INTERVAL_MS;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Omit<PubtrailConfig, 'owner'> = {
    eutils: {
        baseUrl: 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils/',
        tool: 'pubtrail',
        email: 'pubtrail@example.com',
        timeoutMs: 30000,
    },
    db: './pubtrail.db',
    pageSize: 10,
    sort: 'relevance',
    logLevel: 'info',
    jsonLogs: false,
};
