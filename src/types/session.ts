import type { Article, ContinuationTokens } from './article.js';

/**
 * Durable record of one search performed by one owner.
 * Immutable once written; only deletion changes it.
 */
export interface SearchSession {
    id: string;
    owner: string;
    query: string;

    /** ISO-8601, sortable */
    createdAt: string;

    totalCount: number;

    /** At most SNAPSHOT_LIMIT articles, text shortened for storage */
    snapshot: Article[];

    tokens: ContinuationTokens | null;
}

export type SessionSummary = Pick<SearchSession, 'id' | 'query' | 'createdAt' | 'totalCount'>;

/**
 * Row shape of the `search_sessions` table.
 */
export interface SessionRow {
    id: string;
    owner: string;
    query: string;
    created_at: string;
    total_count: number;
    snapshot_json: string;
    web_env: string | null;
    query_key: string | null;
}
