import type { ContinuationTokens, FetchResult, SearchSession, SearchSource, SortOrder } from '../types/index.js';
import type { SessionStore } from '../storage/session-store.js';
import { StructuralError, TransportError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface PageWindow {
    pageSize: number;
    offset: number;
}

export interface SearchPageOptions extends PageWindow {
    sort?: SortOrder;
    signal?: AbortSignal;
}

/**
 * One page of a fresh search: submit, then fetch the same window with the
 * tokens that submit returned. Tokens never cross between searches.
 */
export async function searchPage(source: SearchSource, query: string, options: SearchPageOptions): Promise<FetchResult> {
    const { pageSize, offset, sort = 'relevance', signal } = options;

    const submitted = await source.submit(query, pageSize, offset, sort, { signal });
    if (submitted.totalCount === 0 || submitted.ids.length === 0) {
        return { totalCount: submitted.totalCount, records: [], tokens: submitted.tokens };
    }

    if (submitted.tokens) {
        return source.fetch(submitted.tokens, pageSize, offset, { signal, totalCount: submitted.totalCount });
    }

    // No history on the server side; the id page is all we can fetch
    const byIds = await source.fetchByIds(submitted.ids, { signal });
    return { totalCount: submitted.totalCount, records: byIds.records, tokens: null };
}

export interface ResumedPage extends FetchResult {
    session: SearchSession;

    /** How the page was obtained */
    resumedWith: 'tokens' | 'resubmitted';
}

/**
 * Continue paging a saved session.
 *
 * Tries the stored history tokens first. Their lifetime on the server is
 * unknown, so a transport or structural failure falls back to resubmitting
 * the stored query text. Cancellation and other errors propagate.
 */
export async function resumeSession(
    store: SessionStore,
    source: SearchSource,
    owner: string,
    sessionId: string,
    window: PageWindow & { sort?: SortOrder; signal?: AbortSignal }
): Promise<ResumedPage> {
    const session = store.get(owner, sessionId);

    if (session.tokens) {
        try {
            const page = await fetchWithTokens(source, session.tokens, session.totalCount, window);
            if (page.records.length > 0 || window.offset >= session.totalCount) {
                return { ...page, session, resumedWith: 'tokens' };
            }
            getLogger().info({ sessionId }, 'Stored tokens returned nothing, resubmitting query');
        } catch (error) {
            if (!(error instanceof TransportError) && !(error instanceof StructuralError)) {
                throw error;
            }
            if (error instanceof TransportError && error.kind === 'cancelled') {
                throw error;
            }
            getLogger().info({ sessionId, error: error.message }, 'Stored tokens rejected, resubmitting query');
        }
    }

    const page = await searchPage(source, session.query, window);
    return { ...page, session, resumedWith: 'resubmitted' };
}

function fetchWithTokens(
    source: SearchSource,
    tokens: ContinuationTokens,
    totalCount: number,
    window: PageWindow & { signal?: AbortSignal }
): Promise<FetchResult> {
    return source.fetch(tokens, window.pageSize, window.offset, { signal: window.signal, totalCount });
}
