import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { resumeSession, searchPage } from '../search/pager.js';
import { SessionStore } from '../storage/session-store.js';
import { NotFoundError, StructuralError, TransportError } from '../utils/errors.js';
import type { ContinuationTokens, FetchResult, SearchSource, SubmitResult } from '../types/index.js';
import { makeArticle, pmids } from './fixtures.js';

const TOKENS: ContinuationTokens = { webEnv: 'MCID_test_01', queryKey: '1' };
const FRESH_TOKENS: ContinuationTokens = { webEnv: 'MCID_test_02', queryKey: '1' };

/**
 * In-memory search service over a fixed id list.
 */
function fakeSource(options: { total?: number; tokens?: ContinuationTokens | null } = {}) {
    const total = options.total ?? 25;
    const tokens = options.tokens === undefined ? FRESH_TOKENS : options.tokens;
    const all = pmids(total);
    const page = (pageSize: number, offset: number) => all.slice(offset, offset + pageSize).map((pmid) => makeArticle(pmid));

    const source = {
        submit: vi.fn(async (_query: string, pageSize: number, offset: number): Promise<SubmitResult> => ({
            totalCount: total,
            ids: all.slice(offset, offset + pageSize),
            tokens,
            records: [],
        })),
        fetch: vi.fn(async (t: ContinuationTokens, pageSize: number, offset: number, opts?: { totalCount?: number }): Promise<FetchResult> => {
            const records = page(pageSize, offset);
            return { totalCount: opts?.totalCount ?? records.length, records, tokens: t };
        }),
        fetchByIds: vi.fn(async (ids: string[]): Promise<FetchResult> => ({
            totalCount: ids.length,
            records: ids.map((pmid) => makeArticle(pmid)),
            tokens: null,
        })),
        related: vi.fn(async (): Promise<FetchResult> => ({ totalCount: 0, records: [], tokens: null })),
    } satisfies SearchSource;

    return source;
}

describe('searchPage', () => {
    it('should submit before fetching with the returned tokens', async () => {
        const source = fakeSource();

        const result = await searchPage(source, 'asthma', { pageSize: 10, offset: 10, sort: 'pub_date' });

        expect(source.submit).toHaveBeenCalledWith('asthma', 10, 10, 'pub_date', { signal: undefined });
        expect(source.fetch).toHaveBeenCalledWith(FRESH_TOKENS, 10, 10, { signal: undefined, totalCount: 25 });
        expect(source.submit.mock.invocationCallOrder[0]).toBeLessThan(source.fetch.mock.invocationCallOrder[0] ?? 0);
        expect(result.totalCount).toBe(25);
        expect(result.records.map((r) => r.pmid)).toEqual(pmids(10, 40000011));
        expect(result.tokens).toEqual(FRESH_TOKENS);
    });

    it('should skip the fetch when nothing matched', async () => {
        const source = fakeSource({ total: 0 });

        const result = await searchPage(source, 'nonexistent term', { pageSize: 10, offset: 0 });

        expect(result).toEqual({ totalCount: 0, records: [], tokens: FRESH_TOKENS });
        expect(source.fetch).not.toHaveBeenCalled();
        expect(source.fetchByIds).not.toHaveBeenCalled();
    });

    it('should fetch by ids when the service kept no history', async () => {
        const source = fakeSource({ tokens: null });

        const result = await searchPage(source, 'asthma', { pageSize: 5, offset: 0 });

        expect(source.fetch).not.toHaveBeenCalled();
        expect(source.fetchByIds).toHaveBeenCalledWith(pmids(5), { signal: undefined });
        expect(result).toMatchObject({ totalCount: 25, tokens: null });
        expect(result.records).toHaveLength(5);
    });

    it('should return a short last page', async () => {
        const result = await searchPage(fakeSource(), 'asthma', { pageSize: 10, offset: 20 });
        expect(result.records).toHaveLength(5);
    });
});

describe('resumeSession', () => {
    let tmpDir: string;
    let store: SessionStore;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pubtrail-pager-'));
        store = new SessionStore(path.join(tmpDir, 'sessions.db'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    function saved(tokens: ContinuationTokens | null = TOKENS): string {
        return store.save('alice', 'asthma', { totalCount: 25, records: [makeArticle('40000001')], tokens });
    }

    it('should page with the stored tokens', async () => {
        const id = saved();
        const source = fakeSource();

        const page = await resumeSession(store, source, 'alice', id, { pageSize: 10, offset: 10 });

        expect(page.resumedWith).toBe('tokens');
        expect(source.fetch).toHaveBeenCalledWith(TOKENS, 10, 10, { signal: undefined, totalCount: 25 });
        expect(source.submit).not.toHaveBeenCalled();
        expect(page.records.map((r) => r.pmid)).toEqual(pmids(10, 40000011));
        expect(page.session.id).toBe(id);
    });

    it('should resubmit the query when the stored tokens are rejected', async () => {
        const id = saved();
        const source = fakeSource();
        source.fetch.mockRejectedValueOnce(new StructuralError('Expected <PubmedArticleSet> document'));

        const page = await resumeSession(store, source, 'alice', id, { pageSize: 10, offset: 0 });

        expect(page.resumedWith).toBe('resubmitted');
        expect(source.submit).toHaveBeenCalledWith('asthma', 10, 0, 'relevance', { signal: undefined });
        expect(source.fetch).toHaveBeenLastCalledWith(FRESH_TOKENS, 10, 0, { signal: undefined, totalCount: 25 });
        expect(page.records).toHaveLength(10);
    });

    it('should resubmit after a transport failure on the stored tokens', async () => {
        const id = saved();
        const source = fakeSource();
        source.fetch.mockRejectedValueOnce(
            new TransportError('HTTP 400: Bad Request', { kind: 'status', status: 400, retryable: false, url: 'https://eutils.test/efetch.fcgi' })
        );

        const page = await resumeSession(store, source, 'alice', id, { pageSize: 10, offset: 0 });
        expect(page.resumedWith).toBe('resubmitted');
    });

    it('should resubmit when the stored tokens return an empty page inside the result range', async () => {
        const id = saved();
        const source = fakeSource();
        source.fetch.mockResolvedValueOnce({ totalCount: 25, records: [], tokens: TOKENS });

        const page = await resumeSession(store, source, 'alice', id, { pageSize: 10, offset: 0 });

        expect(page.resumedWith).toBe('resubmitted');
        expect(page.records).toHaveLength(10);
    });

    it('should accept an empty page past the end of the results', async () => {
        const id = saved();
        const source = fakeSource();

        const page = await resumeSession(store, source, 'alice', id, { pageSize: 10, offset: 30 });

        expect(page.resumedWith).toBe('tokens');
        expect(page.records).toEqual([]);
        expect(source.submit).not.toHaveBeenCalled();
    });

    it('should resubmit a session saved without tokens', async () => {
        const id = saved(null);
        const source = fakeSource();

        const page = await resumeSession(store, source, 'alice', id, { pageSize: 10, offset: 0 });

        expect(page.resumedWith).toBe('resubmitted');
        expect(source.submit).toHaveBeenCalledTimes(1);
    });

    it('should not resubmit after the caller cancels', async () => {
        const id = saved();
        const source = fakeSource();
        source.fetch.mockRejectedValueOnce(
            new TransportError('Request cancelled: https://eutils.test/efetch.fcgi', {
                kind: 'cancelled',
                retryable: false,
                url: 'https://eutils.test/efetch.fcgi',
            })
        );

        await expect(resumeSession(store, source, 'alice', id, { pageSize: 10, offset: 0 })).rejects.toMatchObject({ kind: 'cancelled' });
        expect(source.submit).not.toHaveBeenCalled();
    });

    it('should propagate errors that are not transport or structural', async () => {
        const id = saved();
        const source = fakeSource();
        source.fetch.mockRejectedValueOnce(new RangeError('offset must be a non-negative integer, got -1'));

        await expect(resumeSession(store, source, 'alice', id, { pageSize: 10, offset: 0 })).rejects.toThrow(RangeError);
        expect(source.submit).not.toHaveBeenCalled();
    });

    it('should not resume another owner\'s session', async () => {
        const id = saved();
        await expect(resumeSession(store, fakeSource(), 'bob', id, { pageSize: 10, offset: 0 })).rejects.toBeInstanceOf(NotFoundError);
    });
});
