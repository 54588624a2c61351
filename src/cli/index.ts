#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger, parseLogLevel } from '../utils/logger.js';
import { IntervalRateGovernor } from '../utils/rate-governor.js';
import { withRetry } from '../utils/retry.js';
import { describeForUser } from '../utils/errors.js';
import { createEutilsClient, type EutilsClient } from '../sources/eutils.js';
import { SessionStore } from '../storage/session-store.js';
import { resumeSession, searchPage } from '../search/pager.js';
import { SORT_ORDERS, minIntervalFor, type Article, type FetchResult, type PubtrailConfig, type SortOrder } from '../types/index.js';

const VERSION = '1.0.0';

interface GlobalOptions {
    owner?: string;
    db?: string;
    logLevel?: string;
    jsonLogs?: boolean;
    timeout?: number;
}

interface Runtime {
    config: PubtrailConfig;
    client: EutilsClient;
    store: SessionStore;
    signal: AbortSignal;
}

const program = new Command();

program
    .name('pubtrail')
    .description('Search PubMed, page through results, and keep resumable search sessions.')
    .version(VERSION)
    .option('--owner <owner>', 'Session owner (default: OS user)')
    .option('--db <path>', 'Session database path')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
    .option('--json-logs', 'Output JSON logs')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds', parsePositiveInt);

// ─── SEARCH command ───────────────────────────────────────

program
    .command('search')
    .description('Search PubMed and print one page of results')
    .argument('<query>', 'PubMed query text')
    .option('-n, --page-size <n>', 'Records per page', parsePositiveInt)
    .option('--offset <n>', 'Index of the first record', parseNonNegativeInt, 0)
    .option('--sort <order>', `Sort order: ${SORT_ORDERS.join(' | ')}`, parseSortOrder)
    .option('--save', 'Save the search as a session', false)
    .option('--json', 'Print JSON instead of text', false)
    .action(async (query: string, opts: { pageSize?: number; offset: number; sort?: SortOrder; save: boolean; json: boolean }) => {
        const { config, client, store, signal } = await setup();
        const pageSize = opts.pageSize ?? config.pageSize;

        const result = await withRetry(
            () => searchPage(client, query, { pageSize, offset: opts.offset, sort: opts.sort ?? config.sort, signal }),
            { signal }
        );

        if (result.totalCount === 0) {
            const suggestion = await withRetry(() => client.suggest(query, { signal }), { signal });
            if (suggestion) console.error(`No results. Did you mean: ${suggestion}`);
        }

        let sessionId: string | undefined;
        if (opts.save) {
            sessionId = store.save(config.owner, query, result);
        }

        printResult(result, opts.offset, opts.json, sessionId);
    });

// ─── ARTICLE command ──────────────────────────────────────

program
    .command('article')
    .description('Fetch one article by PMID')
    .argument('<pmid>', 'PubMed identifier')
    .option('--json', 'Print JSON instead of text', false)
    .action(async (pmid: string, opts: { json: boolean }) => {
        const { client, signal } = await setup();
        const result = await withRetry(() => client.fetchByIds([pmid], { signal }), { signal });

        if (result.records.length === 0) {
            console.error(`Article ${pmid} not found.`);
            process.exitCode = 1;
            return;
        }
        printResult(result, 0, opts.json);
    });

// ─── RELATED command ──────────────────────────────────────

program
    .command('related')
    .description('Fetch articles related to a PMID')
    .argument('<pmid>', 'PubMed identifier')
    .option('-n, --max-results <n>', 'Maximum related articles', parsePositiveInt, 10)
    .option('--json', 'Print JSON instead of text', false)
    .action(async (pmid: string, opts: { maxResults: number; json: boolean }) => {
        const { client, signal } = await setup();
        const result = await withRetry(() => client.related(pmid, opts.maxResults, { signal }), { signal });
        printResult(result, 0, opts.json);
    });

// ─── SUGGEST command ──────────────────────────────────────

program
    .command('suggest')
    .description('Spelling suggestion for a query')
    .argument('<query>', 'PubMed query text')
    .action(async (query: string) => {
        const { client, signal } = await setup();
        const suggestion = await withRetry(() => client.suggest(query, { signal }), { signal });
        console.log(suggestion ?? '(no suggestion)');
    });

// ─── HISTORY commands ─────────────────────────────────────

const history = program.command('history').description('Manage saved search sessions');

history
    .command('list')
    .description('List saved sessions, newest first')
    .option('--limit <n>', 'Maximum sessions', parsePositiveInt, 20)
    .action(async (opts: { limit: number }) => {
        const { config, store } = await setup();
        const sessions = store.list(config.owner, opts.limit);

        if (sessions.length === 0) {
            console.log('No saved sessions.');
            return;
        }
        for (const session of sessions) {
            console.log(`${session.id}  ${session.createdAt}  ${String(session.totalCount).padStart(7)}  ${session.query}`);
        }
    });

history
    .command('show')
    .description('Show a saved session and its snapshot')
    .argument('<id>', 'Session id')
    .option('--json', 'Print JSON instead of text', false)
    .action(async (id: string, opts: { json: boolean }) => {
        const { config, store } = await setup();
        const session = store.get(config.owner, id);

        if (opts.json) {
            console.log(JSON.stringify(session, null, 2));
            return;
        }
        console.log(`\nQuery:   ${session.query}`);
        console.log(`Saved:   ${session.createdAt}`);
        console.log(`Matches: ${session.totalCount}`);
        console.log(`History: ${session.tokens ? 'available' : 'none'}\n`);
        session.snapshot.forEach((article, index) => printArticle(article, index + 1));
    });

history
    .command('resume')
    .description('Fetch another page of a saved session')
    .argument('<id>', 'Session id')
    .option('-n, --page-size <n>', 'Records per page', parsePositiveInt)
    .option('--offset <n>', 'Index of the first record', parseNonNegativeInt, 0)
    .option('--json', 'Print JSON instead of text', false)
    .action(async (id: string, opts: { pageSize?: number; offset: number; json: boolean }) => {
        const { config, client, store, signal } = await setup();
        const page = await withRetry(
            () =>
                resumeSession(store, client, config.owner, id, {
                    pageSize: opts.pageSize ?? config.pageSize,
                    offset: opts.offset,
                    sort: config.sort,
                    signal,
                }),
            { signal }
        );

        getLogger().info({ id, resumedWith: page.resumedWith }, 'Session resumed');
        printResult(page, opts.offset, opts.json);
    });

history
    .command('delete')
    .description('Delete a saved session')
    .argument('<id>', 'Session id')
    .action(async (id: string) => {
        const { config, store } = await setup();
        store.delete(config.owner, id);
        console.log(`Deleted ${id}.`);
    });

history
    .command('clear')
    .description('Delete all of your saved sessions')
    .action(async () => {
        const { config, store } = await setup();
        const count = store.clear(config.owner);
        console.log(`Deleted ${count} sessions.`);
    });

// ─── Shared setup ─────────────────────────────────────────

async function setup(): Promise<Runtime> {
    const global = program.opts<GlobalOptions>();

    const overrides: ConfigOverrides = {};
    if (global.owner) overrides.owner = global.owner;
    if (global.db) overrides.db = global.db;
    if (global.jsonLogs) overrides.jsonLogs = true;
    const level = parseLogLevel(global.logLevel);
    if (level) overrides.logLevel = level;
    if (global.timeout) overrides.eutils = { timeoutMs: global.timeout };

    const config = await resolveConfig(overrides);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

    const governor = new IntervalRateGovernor(minIntervalFor(config.eutils));
    const client = createEutilsClient({ ...config.eutils, governor, version: VERSION });

    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    getLogger().debug({ owner: config.owner, db: config.db, minIntervalMs: governor.minIntervalMs }, 'Configured');
    return { config, client, store: new SessionStore(config.db), signal: controller.signal };
}

function printResult(result: FetchResult, offset: number, json: boolean, sessionId?: string): void {
    if (json) {
        console.log(JSON.stringify({ ...result, sessionId }, null, 2));
        return;
    }

    const shown = result.records.length;
    const range = shown > 0 ? `${offset + 1}-${offset + shown}` : '0';
    console.log(`\n${result.totalCount} matches, showing ${range}\n`);
    result.records.forEach((article, index) => printArticle(article, offset + index + 1));

    if (sessionId) console.log(`Saved as session ${sessionId}`);
}

function printArticle(article: Article, position: number): void {
    console.log(`${position}. ${article.title}`);
    console.log(`   ${article.authors.join(', ') || 'Unknown'}. ${article.journal}. ${article.pubDate || article.year}`);
    console.log(`   PMID ${article.pmid}  ${article.url}`);
    console.log('');
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

function parseNonNegativeInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

function parseSortOrder(value: string): SortOrder {
    const order = SORT_ORDERS.find((candidate) => candidate === value);
    if (!order) {
        throw new InvalidArgumentError(`Expected one of: ${SORT_ORDERS.join(', ')}.`);
    }
    return order;
}

program.parseAsync().catch((error: unknown) => {
    getLogger().error({ error }, 'Command failed');
    console.error(describeForUser(error));
    process.exitCode = 1;
});
