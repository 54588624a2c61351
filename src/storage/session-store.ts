import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { Article, FetchResult, SearchSession, SessionRow, SessionSummary } from '../types/index.js';
import { NotFoundError, StructuralError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { truncateText } from '../sources/utils.js';

/** Records kept per session */
export const SNAPSHOT_LIMIT = 5;

/** Characters kept of each abstract and section */
export const SNAPSHOT_TEXT_LIMIT = 1000;

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Search sessions: one row per saved search, owner-scoped
CREATE TABLE IF NOT EXISTS search_sessions (
  id TEXT PRIMARY KEY,
  owner TEXT NOT NULL,
  query TEXT NOT NULL,
  created_at TEXT NOT NULL,
  total_count INTEGER NOT NULL DEFAULT 0,
  snapshot_json TEXT NOT NULL DEFAULT '[]',
  web_env TEXT,
  query_key TEXT,
  CHECK ((web_env IS NULL) = (query_key IS NULL))
);

-- Listing is always per owner, newest first
CREATE INDEX IF NOT EXISTS idx_sessions_owner_created ON search_sessions(owner, created_at);
`;

const ArticleSchema = z.object({
    pmid: z.string().min(1),
    title: z.string(),
    authors: z.array(z.string()),
    journal: z.string(),
    year: z.string(),
    pubDate: z.string(),
    doi: z.string().nullable(),
    abstract: z.string(),
    sections: z.array(z.tuple([z.string(), z.string()])),
    url: z.string(),
});

const SnapshotSchema = z.array(ArticleSchema);

/**
 * Durable, owner-scoped store of search sessions.
 *
 * The database is opened for each operation and closed before it returns,
 * so no connection outlives a call. Ownership is part of every WHERE clause:
 * another owner's session is indistinguishable from a missing one.
 */
export class SessionStore {
    constructor(
        private readonly dbPath: string,
        private readonly now: () => Date = () => new Date()
    ) {}

    /**
     * Persist a search. Keeps the first SNAPSHOT_LIMIT records, text shortened.
     * Returns the new session id.
     */
    save(owner: string, query: string, result: FetchResult): string {
        const id = uuidv4();
        const snapshot = result.records.slice(0, SNAPSHOT_LIMIT).map(shortenForStorage);

        const row: SessionRow = {
            id,
            owner,
            query,
            created_at: this.now().toISOString(),
            total_count: result.totalCount,
            snapshot_json: JSON.stringify(snapshot, null, 2),
            web_env: result.tokens?.webEnv ?? null,
            query_key: result.tokens?.queryKey ?? null,
        };

        this.withDatabase((db) => {
            db.prepare<SessionRow>(`
        INSERT INTO search_sessions (id, owner, query, created_at, total_count, snapshot_json, web_env, query_key)
        VALUES (@id, @owner, @query, @created_at, @total_count, @snapshot_json, @web_env, @query_key)
      `).run(row);
        });

        getLogger().debug({ id, owner, records: snapshot.length }, 'Session saved');
        return id;
    }

    /**
     * Summaries of an owner's sessions, newest first.
     */
    list(owner: string, limit = 20): SessionSummary[] {
        if (!Number.isInteger(limit) || limit < 1) {
            throw new RangeError(`limit must be a positive integer, got ${limit}`);
        }

        const rows = this.withDatabase((db) =>
            db.prepare<[string, number], Pick<SessionRow, 'id' | 'query' | 'created_at' | 'total_count'>>(`
        SELECT id, query, created_at, total_count FROM search_sessions
        WHERE owner = ?
        ORDER BY created_at DESC, rowid DESC
        LIMIT ?
      `).all(owner, limit)
        );

        return rows.map((row) => ({
            id: row.id,
            query: row.query,
            createdAt: row.created_at,
            totalCount: row.total_count,
        }));
    }

    /**
     * Full session with its snapshot and tokens.
     * @throws NotFoundError when no session `id` exists for `owner`
     */
    get(owner: string, id: string): SearchSession {
        const row = this.withDatabase((db) =>
            db.prepare<[string, string], SessionRow>('SELECT * FROM search_sessions WHERE id = ? AND owner = ?').get(id, owner)
        );

        if (!row) {
            throw new NotFoundError(`Session ${id} not found`);
        }

        return {
            id: row.id,
            owner: row.owner,
            query: row.query,
            createdAt: row.created_at,
            totalCount: row.total_count,
            snapshot: parseSnapshot(row.id, row.snapshot_json),
            tokens: row.web_env !== null && row.query_key !== null
                ? { webEnv: row.web_env, queryKey: row.query_key }
                : null,
        };
    }

    /**
     * Remove one session. Removing a missing session is not an error.
     */
    delete(owner: string, id: string): void {
        const changes = this.withDatabase((db) =>
            db.prepare<[string, string]>('DELETE FROM search_sessions WHERE id = ? AND owner = ?').run(id, owner).changes
        );
        getLogger().debug({ id, owner, changes }, 'Session delete');
    }

    /**
     * Remove all of an owner's sessions. Returns how many were removed.
     */
    clear(owner: string): number {
        return this.withDatabase((db) =>
            db.prepare<[string]>('DELETE FROM search_sessions WHERE owner = ?').run(owner).changes
        );
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Open, migrate, run `fn`, close.
     */
    private withDatabase<T>(fn: (db: Database.Database) => T): T {
        const db = new Database(this.dbPath);
        try {
            db.pragma('journal_mode = WAL');
            migrate(db);
            return fn(db);
        } finally {
            db.close();
        }
    }
}

/**
 * Run schema migrations.
 */
function migrate(db: Database.Database): void {
    const currentVersion = Number(db.pragma('user_version', { simple: true }));

    if (currentVersion < 1) {
        db.exec(MIGRATION_V1);
        db.pragma('user_version = 1');
        getLogger().info('Session database migrated to v1');
    }
}

function shortenForStorage(article: Article): Article {
    return {
        ...article,
        abstract: truncateText(article.abstract, SNAPSHOT_TEXT_LIMIT),
        sections: article.sections.map(([label, text]) => [label, truncateText(text, SNAPSHOT_TEXT_LIMIT)]),
    };
}

function parseSnapshot(id: string, json: string): Article[] {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (error) {
        throw new StructuralError(`Session ${id} has an unreadable snapshot`, json.slice(0, 200), { cause: error });
    }

    const parsed = SnapshotSchema.safeParse(raw);
    if (!parsed.success) {
        throw new StructuralError(`Session ${id} snapshot does not match the article shape`, json.slice(0, 200), {
            cause: parsed.error,
        });
    }
    return parsed.data;
}
