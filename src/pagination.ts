import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { log, type Log } from 'crawlee';
import { FetchError, ParseError, errorMessage } from './errors.js';
import type { DebugArtifactStore } from './debug-store.js';
import { countEntries, entriesAfter } from './extractor.js';
import { politely, type FetchResponse, type Fetcher, type PolitenessOptions } from './fetcher.js';
import { absoluteUrl } from './normalize.js';
import type { SiteConfig } from './sites.js';

/**
 * ---------------------------------------------------------------------------
 * AJAX pagination
 *
 * Hashtag pages are not URL-paginated: a "load more" control carries the continuation
 * (data-hash, data-id, data-page, data-cursor, data-x) and each follow-up returns a fragment
 * with the next entries. Two drivers issue the follow-up:
 *
 *  • AjaxLoadMoreDriver  : follows the control's href when it has one, otherwise replays its
 *                          XHR (form POST to the load-more endpoint) through a Fetcher
 *  • ClickLoadMoreDriver : clicks the control on a live rendered page, waits, and returns
 *                          only the entries the click appended
 *
 * The resolver owns the loop bookkeeping. It ends with exactly one of
 *  exhausted(no-control | no-new-entries | max-loads)  or  stopped-early(url, attempts, status).
 * ---------------------------------------------------------------------------
 */

// ===[ Types ]===============================================================
export type LoadMoreControl = {
    /** Selector that matched the control (the click driver clicks it). */
    selector: string;
    params: Record<string, string>;
    href: string | null;
};

export type ExhaustionReason = 'no-control' | 'no-new-entries' | 'max-loads';

export type PaginationStatus =
    | { kind: 'more' }
    | { kind: 'exhausted'; reason: ExhaustionReason }
    | { kind: 'stopped-early'; url: string; attempts: number; lastStatus: number | null; message: string };

export type PaginationState = {
    readonly hashtag: string;
    readonly pageUrl: string;
    control: LoadMoreControl | null;
    loads: number;
    status: PaginationStatus;
};

export type LoadMoreResult = {
    url: string;
    body: string;
    /**
     * Continuation carried by the response: a control, `null` when the response says there is
     * no more, `undefined` when it says nothing (the previous token is then advanced).
     */
    control: LoadMoreControl | null | undefined;
};

export interface LoadMoreDriver {
    open(url: string): Promise<FetchResponse>;
    loadMore(control: LoadMoreControl, state: PaginationState): Promise<LoadMoreResult>;
    close(): Promise<void>;
}

// ===[ Control discovery ]===================================================
function isHidden($: CheerioAPI, selector: string): boolean {
    const el = $(selector).first();
    if (el.is('[disabled], .disabled, .hidden, .d-none')) return true;
    return /display\s*:\s*none/i.test(el.attr('style') ?? '');
}

function scriptTokens($: CheerioAPI, site: SiteConfig): Record<string, string> {
    const found: Record<string, string> = {};
    const scripts = $('script:not([src])').toArray().map((el) => $(el).html() ?? '').join('\n');
    for (const [name, pattern] of Object.entries(site.loadMore.scriptTokens)) {
        const m = scripts.match(pattern);
        if (m?.[1]) found[name] = m[1];
    }
    return found;
}

/**
 * Load-more control of a document or fragment, or null when there is none (or it is disabled).
 * Parameter precedence: data-* attribute → inline-script value → site default. The defaults
 * only complete a continuation the page actually carries: a control with no data-* or script
 * token gets no params, so a link-only control is followed by its href.
 */
export function findLoadMoreControl(html: string | CheerioAPI, site: SiteConfig): LoadMoreControl | null {
    const $ = typeof html === 'string' ? cheerio.load(html) : html;
    for (const selector of site.loadMore.controls) {
        const el = $(selector).first();
        if (!el.length) continue;
        if (isHidden($, selector)) return null;

        const fromScripts = scriptTokens($, site);
        const found: Record<string, string> = {};
        for (const name of Object.keys(site.loadMore.params)) {
            const value = el.attr(`data-${name}`)?.trim() || fromScripts[name];
            if (value) found[name] = value;
        }
        const params: Record<string, string> = {};
        if (Object.keys(found).length) {
            for (const [name, fallback] of Object.entries(site.loadMore.params)) {
                const value = found[name] ?? fallback;
                if (value) params[name] = value;
            }
        }
        return { selector, params, href: absoluteUrl(el.attr('href'), site.baseUrl) };
    }
    return null;
}

/** Next token when a response does not carry one: one page further, cursor moved by what arrived. */
export function advanceControl(control: LoadMoreControl, received: number): LoadMoreControl {
    const params = { ...control.params };
    if (/^\d+$/.test(params.page ?? '')) params.page = String(parseInt(params.page, 10) + 1);
    if (/^\d+$/.test(params.cursor ?? '')) params.cursor = String(parseInt(params.cursor, 10) + received);
    return { ...control, params };
}

// ===[ Responses ]===========================================================
function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(obj: Record<string, unknown>, keys: readonly string[]): string | undefined {
    for (const key of keys) {
        const v = obj[key];
        if (typeof v === 'string' || typeof v === 'number') return String(v);
    }
    return undefined;
}

/**
 * Load-more response → fragment + continuation. Two shapes are served:
 *  - an HTML fragment (optionally with a fresh control inside)
 *  - a JSON envelope `{ html | videos, cursor?, page?, has_more? }` where `videos` holds
 *    markup strings; any other entry is a ParseError, never an empty page
 */
export function parseLoadMoreResponse(
    resp: FetchResponse,
    site: SiteConfig,
    previous: LoadMoreControl,
): LoadMoreResult {
    const trimmed = resp.body.trim();
    const looksJson = resp.contentType.includes('json') || /^[{[]/.test(trimmed);
    if (!looksJson) {
        const control = findLoadMoreControl(trimmed, site);
        return { url: resp.url, body: trimmed, control: control ?? undefined };
    }

    let data: unknown;
    try {
        data = JSON.parse(trimmed);
    } catch (e) {
        throw new ParseError(`load-more response is not valid JSON: ${errorMessage(e)}`, resp.url, resp.body);
    }
    const envelope = isRecord(data) && isRecord(data.data) ? data.data : data;
    if (!isRecord(envelope)) throw new ParseError('load-more JSON is not an object', resp.url, resp.body);

    let body = pickString(envelope, ['html', 'content', 'items_html']) ?? '';
    const videos = envelope.videos;
    if (!body && Array.isArray(videos)) {
        const markup = videos.filter((v): v is string => typeof v === 'string');
        if (markup.length !== videos.length) {
            throw new ParseError(
                `load-more JSON lists ${videos.length - markup.length} of ${videos.length} videos as data, not markup`,
                resp.url,
                resp.body,
            );
        }
        body = markup.join('\n');
    }

    const hasMore = envelope.has_more ?? envelope.hasMore ?? envelope.more;
    if (hasMore === false || hasMore === 0 || hasMore === '0') return { url: resp.url, body, control: null };

    const cursor = pickString(envelope, ['next_cursor', 'nextCursor', 'cursor']);
    const page = pickString(envelope, ['next_page', 'nextPage', 'page']);
    if (cursor === undefined && page === undefined) {
        return { url: resp.url, body, control: findLoadMoreControl(body, site) ?? undefined };
    }
    const params = { ...previous.params };
    if (cursor !== undefined) params.cursor = cursor;
    if (page !== undefined) params.page = page;
    return { url: resp.url, body, control: { ...previous, params } };
}

// ===[ Drivers ]=============================================================
export class AjaxLoadMoreDriver implements LoadMoreDriver {
    constructor(
        private readonly fetcher: Fetcher,
        private readonly site: SiteConfig,
    ) {}

    open(url: string): Promise<FetchResponse> {
        return this.fetcher.fetch({ url });
    }

    async loadMore(control: LoadMoreControl, state: PaginationState): Promise<LoadMoreResult> {
        if (control.href) {
            const resp = await this.fetcher.fetch({
                url: control.href,
                headers: { 'X-Requested-With': 'XMLHttpRequest', Referer: state.pageUrl },
            });
            const result = parseLoadMoreResponse(resp, this.site, control);
            // a followed page without a next link is the last one
            return { ...result, control: result.control ?? null };
        }

        const params = { ...control.params };
        if (!Object.keys(params).length) {
            throw new ParseError('load-more control has neither parameters nor href', state.pageUrl);
        }
        params.hash ??= state.hashtag;
        const resp = await this.fetcher.fetch({
            url: this.site.loadMore.endpoint,
            method: 'POST',
            params,
            headers: {
                'X-Requested-With': 'XMLHttpRequest',
                Referer: state.pageUrl,
                Accept: 'text/html, */*; q=0.01',
                Origin: this.site.baseUrl,
            },
        });
        return parseLoadMoreResponse(resp, this.site, control);
    }

    close(): Promise<void> {
        return Promise.resolve();
    }
}

/** What the click driver needs from a rendered page (see RenderedPage in browser.ts). */
export interface LivePage {
    open(url: string): Promise<FetchResponse>;
    html(): Promise<string>;
    clickAndWait(selector: string, entrySelector: string, previousCount: number): Promise<number>;
    close(): Promise<void>;
}

export class ClickLoadMoreDriver implements LoadMoreDriver {
    private page?: LivePage;

    constructor(
        private readonly openPage: (userAgent: string) => Promise<LivePage>,
        private readonly site: SiteConfig,
        private readonly politeness: PolitenessOptions,
    ) {}

    private get entrySelector(): string {
        return this.site.entry.containers.join(', ');
    }

    async open(url: string): Promise<FetchResponse> {
        return politely('GET', url, this.politeness, async (userAgent) => {
            await this.page?.close();
            this.page = await this.openPage(userAgent);
            return this.page.open(url);
        });
    }

    async loadMore(control: LoadMoreControl, state: PaginationState): Promise<LoadMoreResult> {
        const page = this.page;
        if (!page) throw new ParseError('load more requested before the page was opened', state.pageUrl);
        const before = countEntries(await page.html(), this.site);
        const after = await politely('click', state.pageUrl, this.politeness, () =>
            page.clickAndWait(control.selector, this.entrySelector, before),
        );
        const html = await page.html();
        log.debug(`click load-more: ${before} → ${after} entries`, { hashtag: state.hashtag });
        return {
            url: state.pageUrl,
            body: entriesAfter(html, this.site, before),
            control: findLoadMoreControl(html, this.site),
        };
    }

    async close(): Promise<void> {
        await this.page?.close();
        this.page = undefined;
    }
}

// ===[ Resolver ]============================================================
export type ResolverOptions = {
    maxLoads: number;
    debugStore?: DebugArtifactStore;
    logger?: Log;
};

export class PaginationResolver {
    private readonly logger: Log;

    constructor(
        private readonly site: SiteConfig,
        private readonly driver: LoadMoreDriver,
        private readonly options: ResolverOptions,
    ) {
        this.logger = options.logger ?? log.child({ prefix: 'Pagination' });
    }

    /** State for a freshly fetched hashtag document. */
    begin(hashtag: string, pageUrl: string, html: string): PaginationState {
        const control = findLoadMoreControl(html, this.site);
        const state: PaginationState = { hashtag, pageUrl, control, loads: 0, status: { kind: 'more' } };
        if (!control) state.status = { kind: 'exhausted', reason: 'no-control' };
        else if (this.options.maxLoads <= 0) state.status = { kind: 'exhausted', reason: 'max-loads' };
        return state;
    }

    /** Performs one load-more, or returns null once the state is terminal. */
    async next(state: PaginationState): Promise<LoadMoreResult | null> {
        if (state.status.kind !== 'more') return null;
        if (state.loads >= this.options.maxLoads) {
            state.status = { kind: 'exhausted', reason: 'max-loads' };
            return null;
        }
        const control = state.control;
        if (!control) {
            state.status = { kind: 'exhausted', reason: 'no-control' };
            return null;
        }

        try {
            const result = await this.driver.loadMore(control, state);
            state.loads += 1;
            return result;
        } catch (e) {
            if (e instanceof FetchError) {
                state.status = {
                    kind: 'stopped-early',
                    url: e.url,
                    attempts: e.attempts,
                    lastStatus: e.lastStatus,
                    message: e.message,
                };
            } else if (e instanceof ParseError) {
                if (e.body !== undefined) await this.options.debugStore?.save(`load-more-${state.hashtag}`, e.body);
                state.status = {
                    kind: 'stopped-early',
                    url: e.url ?? state.pageUrl,
                    attempts: 1,
                    lastStatus: null,
                    message: e.message,
                };
            } else {
                throw e;
            }
            this.logger.error(`load-more stopped early for #${state.hashtag}`, { ...state.status, loads: state.loads });
            return null;
        }
    }

    /**
     * Books the outcome of a load: `added` = records that were new to the run,
     * `received` = entries the response contained.
     */
    settle(state: PaginationState, result: LoadMoreResult, added: number, received: number): void {
        if (state.status.kind !== 'more') return;
        if (added === 0) {
            state.status = { kind: 'exhausted', reason: 'no-new-entries' };
            return;
        }
        if (result.control === null) {
            state.control = null;
            state.status = { kind: 'exhausted', reason: 'no-control' };
            return;
        }
        state.control = result.control ?? (state.control && advanceControl(state.control, received));
        if (state.loads >= this.options.maxLoads) state.status = { kind: 'exhausted', reason: 'max-loads' };
    }
}
