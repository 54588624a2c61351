/**
 * Article — one decoded PubMed record.
 * Produced by the markup decoder from an efetch `PubmedArticleSet` payload.
 */
export interface Article {
    /** PubMed identifier. Never empty for a decoded article. */
    pmid: string;

    /** Article title, inline markup flattened to text */
    title: string;

    /** Authors in byline order, each as "LastName Initials" */
    authors: string[];

    /** Journal title */
    journal: string;

    /** Publication year, or '' when the record carries none */
    year: string;

    /** Month and year as printed by PubMed (e.g. "Mar 2021") */
    pubDate: string;

    /** DOI without resolver prefix */
    doi: string | null;

    /**
     * Abstract body text. When `sections` is non-empty this is the
     * "LABEL: text" rendering of those sections.
     */
    abstract: string;

    /**
     * Labeled abstract parts in document order.
     * Empty when the abstract is not subdivided.
     */
    sections: Array<[label: string, text: string]>;

    /** Canonical PubMed landing page */
    url: string;
}

/**
 * Opaque E-utilities history handle. Only ever read from an esearch
 * response; a later efetch with the same pair pages through that search.
 */
export interface ContinuationTokens {
    webEnv: string;
    queryKey: string;
}

/**
 * Uniform result of every remote operation.
 */
export interface FetchResult {
    totalCount: number;
    records: Article[];
    tokens: ContinuationTokens | null;
}

/**
 * Phase-one result: the page of identifiers plus the history handle.
 */
export interface SubmitResult extends FetchResult {
    ids: string[];
}

export type SortOrder = 'relevance' | 'pub_date' | 'Author' | 'JournalName';

export const SORT_ORDERS: readonly SortOrder[] = ['relevance', 'pub_date', 'Author', 'JournalName'];
