import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { Article, ContinuationTokens } from '../types/index.js';
import { StructuralError } from '../utils/errors.js';
import { flattenMarkup, formatAuthorName, pubmedUrl, stripDoiPrefix } from './utils.js';

/**
 * Decoders for E-utilities XML responses (efetch, esearch, elink, espell).
 */

type XmlNode = { [key: string]: unknown };

const REPEATED_ELEMENTS = new Set([
    'PubmedArticle', 'Author', 'AbstractText', 'ArticleId', 'ELocationID',
    'Id', 'LinkSet', 'LinkSetDb', 'Link',
]);

// Titles and abstracts carry inline markup (<i>, <sup>, ...) that the
// parser would otherwise split into child nodes and reorder.
const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    stopNodes: ['*.ArticleTitle', '*.AbstractText', '*.VernacularTitle'],
    isArray: (tagName) => REPEATED_ELEMENTS.has(tagName),
});

const NO_TITLE = 'No title available';
const NO_ABSTRACT = 'No abstract available';
const UNKNOWN_JOURNAL = 'Unknown Journal';

export interface DecodeReport {
    articles: Article[];

    /** Containers dropped because they lacked a PMID or were malformed */
    skipped: number;
}

/**
 * Decode an efetch `PubmedArticleSet` into Articles.
 * Malformed containers are dropped; only an unparsable document throws.
 */
export function decodeArticles(payload: string): Article[] {
    return decodeArticlesReport(payload).articles;
}

export function decodeArticlesReport(payload: string): DecodeReport {
    const root = parseDocument(payload, 'PubmedArticleSet');

    const articles: Article[] = [];
    let skipped = 0;

    for (const container of asArray(root['PubmedArticle'])) {
        const article = decodeArticle(container);
        if (article) {
            articles.push(article);
        } else {
            skipped++;
        }
    }

    return { articles, skipped };
}

export interface SearchPage {
    totalCount: number;
    ids: string[];
    tokens: ContinuationTokens | null;
}

/**
 * Decode an esearch `eSearchResult`.
 */
export function decodeSearchResult(payload: string): SearchPage {
    const root = parseDocument(payload, 'eSearchResult');

    const errorText = textOf(root['ERROR']);
    if (errorText) {
        throw new StructuralError(`Search rejected: ${errorText}`, excerpt(payload));
    }

    const totalCount = Number.parseInt(textOf(root['Count']), 10);
    if (!Number.isFinite(totalCount) || totalCount < 0) {
        throw new StructuralError('Search response has no Count', excerpt(payload));
    }

    const idList = asNode(root['IdList']);
    const ids = asArray(idList?.['Id']).map(textOf).filter((id) => id.length > 0);

    const webEnv = textOf(root['WebEnv']);
    const queryKey = textOf(root['QueryKey']);
    const tokens = webEnv && queryKey ? { webEnv, queryKey } : null;

    return { totalCount, ids, tokens };
}

/**
 * Decode an elink `eLinkResult` into linked identifiers, in service order.
 * When link sets are named, only `linkName` sets are read.
 */
export function decodeLinkIds(payload: string, linkName = 'pubmed_pubmed'): string[] {
    const root = parseDocument(payload, 'eLinkResult');

    const errorText = textOf(root['ERROR']);
    if (errorText) {
        throw new StructuralError(`Link request rejected: ${errorText}`, excerpt(payload));
    }

    const ids: string[] = [];
    for (const linkSet of asArray(root['LinkSet'])) {
        for (const linkSetDb of asArray(asNode(linkSet)?.['LinkSetDb'])) {
            const db = asNode(linkSetDb);
            const name = textOf(db?.['LinkName']);
            if (name && name !== linkName) continue;

            for (const link of asArray(db?.['Link'])) {
                const id = textOf(asArray(asNode(link)?.['Id'])[0]);
                if (id) ids.push(id);
            }
        }
    }
    return ids;
}

/**
 * Decode an espell `eSpellResult`. Null when the service has no correction.
 */
export function decodeSpellSuggestion(payload: string): string | null {
    const root = parseDocument(payload, 'eSpellResult');
    const corrected = textOf(root['CorrectedQuery']);
    return corrected || null;
}

// ─── Private helpers ──────────────────────────────────────

function parseDocument(payload: string, rootName: string): XmlNode {
    const validation = XMLValidator.validate(payload);
    if (validation !== true) {
        throw new StructuralError(
            `Unparsable XML (line ${validation.err.line}): ${validation.err.msg}`,
            excerpt(payload)
        );
    }

    const document: unknown = parser.parse(payload);
    const node = asNode(document);
    if (!node || !(rootName in node)) {
        throw new StructuralError(`Expected <${rootName}> document`, excerpt(payload));
    }

    // An empty root element parses to ''
    return asNode(node[rootName]) ?? {};
}

function decodeArticle(container: unknown): Article | null {
    const citation = asNode(asNode(container)?.['MedlineCitation']);
    const pmid = textOf(citation?.['PMID']);
    if (!citation || !pmid) return null;

    const article = asNode(citation['Article']);
    if (!article) return null;

    const journal = asNode(article['Journal']);
    const pubDate = asNode(asNode(journal?.['JournalIssue'])?.['PubDate']);
    const year = publicationYear(pubDate);
    const month = textOf(pubDate?.['Month']);

    const { abstract, sections } = decodeAbstract(asNode(article['Abstract']));

    return {
        pmid,
        title: flattenMarkup(textOf(article['ArticleTitle'])) || NO_TITLE,
        authors: decodeAuthors(asNode(article['AuthorList'])),
        journal: textOf(journal?.['Title']) || UNKNOWN_JOURNAL,
        year,
        pubDate: [month, year].filter(Boolean).join(' '),
        doi: decodeDoi(asNode(container), article),
        abstract,
        sections,
        url: pubmedUrl(pmid),
    };
}

function publicationYear(pubDate: XmlNode | undefined): string {
    const year = textOf(pubDate?.['Year']);
    if (year) return year;

    // e.g. "1998 Dec-1999 Jan"
    const medlineDate = textOf(pubDate?.['MedlineDate']);
    const match = /\d{4}/.exec(medlineDate);
    return match ? match[0] : '';
}

function decodeAbstract(abstractNode: XmlNode | undefined): Pick<Article, 'abstract' | 'sections'> {
    const sections = new Map<string, string>();
    const unlabeled: string[] = [];

    for (const part of asArray(abstractNode?.['AbstractText'])) {
        const text = flattenMarkup(textOf(part));
        const label = attributeOf(part, 'Label').trim().toUpperCase();

        if (label) {
            const previous = sections.get(label);
            sections.set(label, previous ? `${previous} ${text}` : text);
        } else if (text) {
            unlabeled.push(text);
        }
    }

    if (sections.size === 0) {
        return { abstract: unlabeled.join(' ') || NO_ABSTRACT, sections: [] };
    }

    const labeled = [...sections].map(([label, text]) => `${label}: ${text}`).join(' ');
    return {
        abstract: [...unlabeled, labeled].join(' '),
        sections: [...sections],
    };
}

function decodeAuthors(authorList: XmlNode | undefined): string[] {
    const names: string[] = [];

    for (const entry of asArray(authorList?.['Author'])) {
        const author = asNode(entry);
        if (!author) continue;

        const name = formatAuthorName(
            textOf(author['LastName']),
            textOf(author['Initials']),
            textOf(author['ForeName'])
        ) || textOf(author['CollectiveName']);

        if (name) names.push(name);
    }

    return names;
}

function decodeDoi(container: XmlNode | undefined, article: XmlNode): string | null {
    const articleIds = asArray(asNode(asNode(container?.['PubmedData'])?.['ArticleIdList'])?.['ArticleId']);
    for (const id of articleIds) {
        if (attributeOf(id, 'IdType') === 'doi') {
            const doi = stripDoiPrefix(textOf(id));
            if (doi) return doi;
        }
    }

    for (const location of asArray(article['ELocationID'])) {
        if (attributeOf(location, 'EIdType') === 'doi') {
            const doi = stripDoiPrefix(textOf(location));
            if (doi) return doi;
        }
    }

    return null;
}

function isNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asNode(value: unknown): XmlNode | undefined {
    return isNode(value) ? value : undefined;
}

function asArray(value: unknown): unknown[] {
    if (value === undefined || value === null || value === '') return [];
    return Array.isArray(value) ? value : [value];
}

/**
 * Text content of an element, whether the parser produced a bare value
 * or an object carrying attributes alongside `#text`.
 */
function textOf(value: unknown): string {
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    const node = asNode(value);
    return node ? textOf(node['#text']) : '';
}

function attributeOf(value: unknown, name: string): string {
    const attribute = asNode(value)?.[`@_${name}`];
    return typeof attribute === 'string' ? attribute : '';
}

function excerpt(payload: string): string {
    return payload.slice(0, 200);
}
