import type {
    Article,
    CallOptions,
    ContinuationTokens,
    FetchOptions,
    FetchResult,
    SearchSource,
    SortOrder,
    SourceAdapterOptions,
    SubmitResult,
} from '../types/index.js';
import { HttpClient, type HttpRequestOptions, type QueryParams } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import type { RateGovernor } from '../utils/rate-governor.js';
import { decodeArticlesReport, decodeLinkIds, decodeSearchResult, decodeSpellSuggestion } from './pubmed-xml.js';

const DB = 'pubmed';

/** Largest retmax E-utilities accepts for esearch/efetch */
export const MAX_PAGE_SIZE = 10000;

/**
 * PubMed client over NCBI E-utilities.
 *
 * Two-phase protocol: `submit` (esearch, usehistory=y) returns the first page
 * of PMIDs plus a WebEnv/query_key pair; `fetch` (efetch) pages through that
 * search by the pair without resubmitting the terms.
 *
 * Every call goes through the shared HttpClient, which waits on the injected
 * rate governor first. Nothing is retried here; see `withRetry`.
 *
 * @see https://www.ncbi.nlm.nih.gov/books/NBK25499/
 */
export class EutilsClient implements SearchSource {
    readonly name = 'PubMed';
    private readonly baseUrl: string;

    constructor(private readonly httpClient: HttpClient, baseUrl: string) {
        this.baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    }

    async submit(
        query: string,
        pageSize: number,
        offset: number,
        sort: SortOrder = 'relevance',
        options: CallOptions = {}
    ): Promise<SubmitResult> {
        assertWindow(pageSize, offset);

        const response = await this.httpClient.get(
            this.endpoint('esearch'),
            {
                db: DB,
                term: query,
                retmax: pageSize,
                retstart: offset,
                sort,
                retmode: 'xml',
                usehistory: 'y',
            },
            requestOptions(options)
        );

        const page = decodeSearchResult(response.data);
        if (!page.tokens) {
            getLogger().warn({ query }, 'Search response carried no history tokens');
        }

        getLogger().debug({ query, totalCount: page.totalCount, ids: page.ids.length }, 'Search submitted');
        return { totalCount: page.totalCount, ids: page.ids, tokens: page.tokens, records: [] };
    }

    async fetch(tokens: ContinuationTokens, pageSize: number, offset: number, options: FetchOptions = {}): Promise<FetchResult> {
        assertWindow(pageSize, offset);

        const records = await this.efetch(
            {
                query_key: tokens.queryKey,
                WebEnv: tokens.webEnv,
                retstart: offset,
                retmax: pageSize,
            },
            options
        );

        return {
            totalCount: options.totalCount ?? records.length,
            records,
            tokens,
        };
    }

    async fetchByIds(ids: string[], options: CallOptions = {}): Promise<FetchResult> {
        const cleaned = ids.map((id) => id.trim()).filter(Boolean);
        if (cleaned.length === 0) {
            return { totalCount: 0, records: [], tokens: null };
        }

        const records = await this.efetch({ id: cleaned.join(',') }, options);
        return { totalCount: records.length, records, tokens: null };
    }

    async related(id: string, maxResults: number, options: CallOptions = {}): Promise<FetchResult> {
        if (!Number.isInteger(maxResults) || maxResults < 1) {
            throw new RangeError(`maxResults must be a positive integer, got ${maxResults}`);
        }

        const response = await this.httpClient.get(
            this.endpoint('elink'),
            {
                dbfrom: DB,
                db: DB,
                id,
                linkname: 'pubmed_pubmed',
                retmode: 'xml',
            },
            requestOptions(options)
        );

        // The similarity set lists the source record itself first
        const linked = decodeLinkIds(response.data)
            .filter((linkedId) => linkedId !== id)
            .slice(0, maxResults);

        getLogger().debug({ id, linked: linked.length }, 'Related records linked');

        if (linked.length === 0) {
            return { totalCount: 0, records: [], tokens: null };
        }

        return this.fetchByIds(linked, options);
    }

    /**
     * Spelling correction for a query, or null when the service has none.
     */
    async suggest(query: string, options: CallOptions = {}): Promise<string | null> {
        const response = await this.httpClient.get(
            this.endpoint('espell'),
            { db: DB, term: query, retmode: 'xml' },
            requestOptions(options)
        );

        const suggestion = decodeSpellSuggestion(response.data);
        return suggestion && suggestion !== query ? suggestion : null;
    }

    // ─── Private helpers ──────────────────────────────────────

    private async efetch(params: QueryParams, options: CallOptions): Promise<Article[]> {
        const response = await this.httpClient.get(
            this.endpoint('efetch'),
            { db: DB, ...params, retmode: 'xml', rettype: 'abstract' },
            requestOptions(options)
        );

        const { articles, skipped } = decodeArticlesReport(response.data);
        if (skipped > 0) {
            getLogger().warn({ skipped, decoded: articles.length }, 'Dropped malformed records from page');
        }
        return articles;
    }

    private endpoint(utility: 'esearch' | 'efetch' | 'elink' | 'espell'): string {
        return `${this.baseUrl}${utility}.fcgi`;
    }
}

/**
 * Build a client wired to one governor, carrying tool/email/api_key on every request.
 */
export function createEutilsClient(
    options: SourceAdapterOptions & { governor: RateGovernor; timeoutMs?: number; version?: string }
): EutilsClient {
    const httpClient = new HttpClient({
        timeout: options.timeoutMs,
        version: options.version,
        email: options.email,
        governor: options.governor,
        defaultParams: {
            tool: options.tool,
            email: options.email,
            api_key: options.apiKey,
        },
    });
    return new EutilsClient(httpClient, options.baseUrl);
}

function requestOptions(options: CallOptions): HttpRequestOptions {
    return { signal: options.signal, timeout: options.timeoutMs };
}

function assertWindow(pageSize: number, offset: number): void {
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
        throw new RangeError(`pageSize must be an integer in 1..${MAX_PAGE_SIZE}, got ${pageSize}`);
    }
    if (!Number.isInteger(offset) || offset < 0) {
        throw new RangeError(`offset must be a non-negative integer, got ${offset}`);
    }
}
