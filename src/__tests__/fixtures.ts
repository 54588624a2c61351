import { readFileSync } from 'node:fs';
import type { Article } from '../types/index.js';

/**
 * Builders for E-utilities payloads and a routing fetch stub.
 */

export function readFixture(name: string): string {
    return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf-8');
}

export function esearchXml(options: { count: number; ids: string[]; webEnv?: string; queryKey?: string }): string {
    const history = [
        options.queryKey !== undefined ? `<QueryKey>${options.queryKey}</QueryKey>` : '',
        options.webEnv !== undefined ? `<WebEnv>${options.webEnv}</WebEnv>` : '',
    ].join('');

    return `<?xml version="1.0" encoding="UTF-8" ?>
<eSearchResult>
<Count>${options.count}</Count><RetMax>${options.ids.length}</RetMax><RetStart>0</RetStart>${history}
<IdList>${options.ids.map((id) => `<Id>${id}</Id>`).join('')}</IdList>
<TranslationSet/>
</eSearchResult>`;
}

export function efetchXml(records: Array<{ pmid: string; title: string }>): string {
    const articles = records.map(({ pmid, title }) => `
<PubmedArticle>
  <MedlineCitation>
    <PMID Version="1">${pmid}</PMID>
    <Article>
      <Journal>
        <JournalIssue><PubDate><Year>2020</Year></PubDate></JournalIssue>
        <Title>Test Journal</Title>
      </Journal>
      <ArticleTitle>${title}</ArticleTitle>
      <Abstract><AbstractText>Abstract of ${pmid}.</AbstractText></Abstract>
      <AuthorList><Author><LastName>Tester</LastName><Initials>T</Initials></Author></AuthorList>
    </Article>
  </MedlineCitation>
</PubmedArticle>`);

    return `<?xml version="1.0" ?>\n<PubmedArticleSet>${articles.join('')}\n</PubmedArticleSet>`;
}

export function elinkXml(sourceId: string, linkedIds: string[]): string {
    const linkSetDb = linkedIds.length === 0
        ? ''
        : `<LinkSetDb><DbTo>pubmed</DbTo><LinkName>pubmed_pubmed</LinkName>${linkedIds
            .map((id) => `<Link><Id>${id}</Id></Link>`)
            .join('')}</LinkSetDb>`;

    return `<?xml version="1.0" encoding="UTF-8" ?>
<eLinkResult>
<LinkSet><DbFrom>pubmed</DbFrom><IdList><Id>${sourceId}</Id></IdList>${linkSetDb}</LinkSet>
</eLinkResult>`;
}

export function pmids(count: number, start = 40000001): string[] {
    return Array.from({ length: count }, (_, i) => String(start + i));
}

export function makeArticle(pmid: string, overrides: Partial<Article> = {}): Article {
    return {
        pmid,
        title: `Article ${pmid}`,
        authors: ['Tester T'],
        journal: 'Test Journal',
        year: '2020',
        pubDate: '2020',
        doi: null,
        abstract: `Abstract of ${pmid}.`,
        sections: [],
        url: `https://pubmed.ncbi.nlm.nih.gov/${pmid}/`,
        ...overrides,
    };
}

export type Route = (url: URL) => Response | Promise<Response>;

/**
 * fetch stand-in that dispatches on the utility name (esearch, efetch, ...)
 * and records every requested URL.
 */
export function routedFetch(routes: Partial<Record<'esearch' | 'efetch' | 'elink' | 'espell', Route>>) {
    const calls: URL[] = [];

    const fetchStub = async (input: string | URL | Request): Promise<Response> => {
        const url = new URL(input instanceof Request ? input.url : String(input));
        calls.push(url);

        const utility = /\/(esearch|efetch|elink|espell)\.fcgi$/.exec(url.pathname)?.[1];
        const route = utility === 'esearch' || utility === 'efetch' || utility === 'elink' || utility === 'espell'
            ? routes[utility]
            : undefined;

        if (!route) return new Response('no route', { status: 404, statusText: 'Not Found' });
        return route(url);
    };

    return { fetchStub, calls };
}

export function xmlResponse(body: string, status = 200): Response {
    return new Response(body, { status, headers: { 'content-type': 'text/xml; charset=UTF-8' } });
}
