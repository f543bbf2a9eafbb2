import { describe, expect, it } from 'vitest';
import { MemoryDebugStore } from './debug-store.js';
import { HttpError, ParseError } from './errors.js';
import type { FetchRequest, FetchResponse, Fetcher } from './fetcher.js';
import {
    AjaxLoadMoreDriver,
    PaginationResolver,
    advanceControl,
    findLoadMoreControl,
    parseLoadMoreResponse,
    type LoadMoreControl,
    type LoadMoreDriver,
    type LoadMoreResult,
} from './pagination.js';
import { URLEBIRD } from './sites.js';
import { fixture, hashPage, thumbs } from './__fixtures__/pages.js';

const PAGE_URL = 'https://urlebird.com/hash/dance/';

const control: LoadMoreControl = {
    selector: '#hash_load_more',
    params: { hash: 'dance', id: '77', page: '2', cursor: '20' },
    href: null,
};

class RecordingFetcher implements Fetcher {
    readonly requests: FetchRequest[] = [];

    constructor(private readonly response: Omit<FetchResponse, 'url'>) {}

    async fetch(req: FetchRequest): Promise<FetchResponse> {
        this.requests.push(req);
        return { url: req.url, ...this.response };
    }

    async close(): Promise<void> {}
}

/** Serves scripted load-more results in order; an Error entry is thrown instead. */
class ScriptedDriver implements LoadMoreDriver {
    calls = 0;

    constructor(private readonly script: Array<LoadMoreResult | Error>) {}

    async open(url: string): Promise<FetchResponse> {
        return { url, status: 200, contentType: 'text/html', body: '' };
    }

    async loadMore(): Promise<LoadMoreResult> {
        const next = this.script[Math.min(this.calls, this.script.length - 1)];
        this.calls += 1;
        if (next instanceof Error) throw next;
        return next;
    }

    async close(): Promise<void> {}
}

const endlessResult: LoadMoreResult = { url: URLEBIRD.loadMore.endpoint, body: thumbs([1, 2]), control };

describe('findLoadMoreControl', () => {
    it('combines data attributes with inline script tokens', () => {
        expect(findLoadMoreControl(fixture('hash-page.html'), URLEBIRD)).toEqual({
            selector: '#hash_load_more',
            params: { hash: 'dance', id: '1234', page: '2', cursor: '40' },
            href: null,
        });
    });

    it('completes a real token with the site defaults', () => {
        const found = findLoadMoreControl('<button class="load-more" data-hash="dance">More</button>', URLEBIRD);
        expect(found?.params).toEqual({ hash: 'dance', page: '2', cursor: '20' });
    });

    it('gives a control without tokens no params', () => {
        expect(findLoadMoreControl('<button class="load-more">More</button>', URLEBIRD)).toEqual({
            selector: 'button.load-more',
            params: {},
            href: null,
        });
    });

    it('resolves a pagination link with its query', () => {
        const html = '<div class="pagination"><a class="next" href="/hash/dance/page/2/?sort=new">Next</a></div>';
        expect(findLoadMoreControl(html, URLEBIRD)).toEqual({
            selector: '.pagination a.next',
            params: {},
            href: 'https://urlebird.com/hash/dance/page/2/?sort=new',
        });
    });

    it('treats a disabled or hidden control as absent', () => {
        expect(findLoadMoreControl('<a id="hash_load_more" class="disabled">More</a>', URLEBIRD)).toBeNull();
        expect(findLoadMoreControl('<a id="hash_load_more" style="display: none">More</a>', URLEBIRD)).toBeNull();
        expect(findLoadMoreControl(hashPage(thumbs([1]), false), URLEBIRD)).toBeNull();
    });
});

describe('advanceControl', () => {
    it('moves the page by one and the cursor by the entries received', () => {
        expect(advanceControl(control, 12).params).toEqual({ hash: 'dance', id: '77', page: '3', cursor: '32' });
    });

    it('leaves non-numeric tokens alone', () => {
        const opaque = { ...control, params: { cursor: 'abc' } };
        expect(advanceControl(opaque, 5).params).toEqual({ cursor: 'abc' });
    });
});

describe('parseLoadMoreResponse', () => {
    const base = { url: URLEBIRD.loadMore.endpoint, status: 200 };

    it('returns an html fragment with no continuation of its own', () => {
        const body = fixture('load-more-fragment.html');
        const result = parseLoadMoreResponse({ ...base, contentType: 'text/html', body }, URLEBIRD, control);
        expect(result.control).toBeUndefined();
        expect(result.body).toBe(body.trim());
    });

    it('reads cursor and page from a JSON envelope', () => {
        const body = JSON.stringify({ html: '<div class="thumb"></div>', cursor: 60, page: 4, has_more: true });
        const result = parseLoadMoreResponse({ ...base, contentType: 'application/json', body }, URLEBIRD, control);
        expect(result.body).toBe('<div class="thumb"></div>');
        expect(result.control?.params).toEqual({ hash: 'dance', id: '77', page: '4', cursor: '60' });
    });

    it('unwraps data and joins a videos array', () => {
        const body = JSON.stringify({ data: { videos: ['<p>a</p>', '<p>b</p>'], next_cursor: 'x1' } });
        const result = parseLoadMoreResponse({ ...base, contentType: 'application/json', body }, URLEBIRD, control);
        expect(result.body).toBe('<p>a</p>\n<p>b</p>');
        expect(result.control?.params.cursor).toBe('x1');
    });

    it('refuses video data it cannot render instead of reporting an empty page', () => {
        const body = JSON.stringify({
            videos: [{ url: 'https://urlebird.com/video/a-1234567/', author: { name: 'x' }, play_count: 5 }],
            has_more: true,
            cursor: 40,
        });
        let caught: unknown;
        try {
            parseLoadMoreResponse({ ...base, contentType: 'application/json', body }, URLEBIRD, control);
        } catch (e) {
            caught = e;
        }
        expect(caught).toBeInstanceOf(ParseError);
        expect(caught).toMatchObject({
            message: 'load-more JSON lists 1 of 1 videos as data, not markup',
            url: 'https://urlebird.com/hash_load_more',
            body,
        });
    });

    it('ends pagination when the server says there is no more', () => {
        const body = JSON.stringify({ html: '', has_more: 0 });
        const result = parseLoadMoreResponse({ ...base, contentType: 'application/json', body }, URLEBIRD, control);
        expect(result.control).toBeNull();
    });

    it('throws a ParseError that keeps the body', () => {
        const resp = { ...base, contentType: 'application/json', body: '{"html": ' };
        let caught: unknown;
        try {
            parseLoadMoreResponse(resp, URLEBIRD, control);
        } catch (e) {
            caught = e;
        }
        expect(caught).toBeInstanceOf(ParseError);
        expect(caught).toMatchObject({ url: 'https://urlebird.com/hash_load_more', body: '{"html": ' });
    });
});

describe('AjaxLoadMoreDriver', () => {
    const state = {
        hashtag: 'dance',
        pageUrl: PAGE_URL,
        control,
        loads: 0,
        status: { kind: 'more' as const },
    };

    it('posts the control parameters to the load-more endpoint', async () => {
        const fetcher = new RecordingFetcher({ status: 200, contentType: 'text/html', body: thumbs([5]) });
        const result = await new AjaxLoadMoreDriver(fetcher, URLEBIRD).loadMore(control, state);

        expect(fetcher.requests).toEqual([{
            url: 'https://urlebird.com/hash_load_more',
            method: 'POST',
            params: { hash: 'dance', id: '77', page: '2', cursor: '20' },
            headers: {
                'X-Requested-With': 'XMLHttpRequest',
                Referer: PAGE_URL,
                Accept: 'text/html, */*; q=0.01',
                Origin: 'https://urlebird.com',
            },
        }]);
        expect(result.control).toBeUndefined();
    });

    it('follows a pagination link instead of posting', async () => {
        const linkPage = '<div class="pagination"><a class="next" href="/hash/dance/page/2/">Next</a></div>';
        const found = findLoadMoreControl(linkPage, URLEBIRD);
        expect(found).not.toBeNull();
        if (!found) return;

        const fetcher = new RecordingFetcher({ status: 200, contentType: 'text/html', body: thumbs([5, 6]) });
        const result = await new AjaxLoadMoreDriver(fetcher, URLEBIRD).loadMore(found, state);

        expect(fetcher.requests).toEqual([{
            url: 'https://urlebird.com/hash/dance/page/2/',
            headers: { 'X-Requested-With': 'XMLHttpRequest', Referer: PAGE_URL },
        }]);
        expect(result.control).toBeNull();
    });

    it('lets the href win over data tokens and carries on with the next link', async () => {
        const nextPage = `${thumbs([5])}<div class="pagination"><a class="next" href="/hash/dance/page/3/">Next</a></div>`;
        const fetcher = new RecordingFetcher({ status: 200, contentType: 'text/html', body: nextPage });
        const both = { ...control, href: 'https://urlebird.com/hash/dance/page/2/' };
        const result = await new AjaxLoadMoreDriver(fetcher, URLEBIRD).loadMore(both, state);

        expect(fetcher.requests[0].method).toBeUndefined();
        expect(fetcher.requests[0].url).toBe('https://urlebird.com/hash/dance/page/2/');
        expect(result.control?.href).toBe('https://urlebird.com/hash/dance/page/3/');
    });

    it('rejects a control it cannot replay', async () => {
        const fetcher = new RecordingFetcher({ status: 200, contentType: 'text/html', body: '' });
        const empty = { selector: 'a.load-more', params: {}, href: null };
        await expect(new AjaxLoadMoreDriver(fetcher, URLEBIRD).loadMore(empty, state)).rejects.toThrow(ParseError);
    });
});

describe('PaginationResolver', () => {
    const firstPage = hashPage(thumbs([1, 2, 3]));

    it('is exhausted right away without a control', () => {
        const resolver = new PaginationResolver(URLEBIRD, new ScriptedDriver([]), { maxLoads: 4 });
        const state = resolver.begin('dance', PAGE_URL, hashPage(thumbs([1]), false));
        expect(state.status).toEqual({ kind: 'exhausted', reason: 'no-control' });
    });

    it('stops at the load cap even when more is always offered', async () => {
        const driver = new ScriptedDriver([endlessResult]);
        const resolver = new PaginationResolver(URLEBIRD, driver, { maxLoads: 2 });
        const state = resolver.begin('dance', PAGE_URL, firstPage);

        let result = await resolver.next(state);
        while (result) {
            resolver.settle(state, result, 2, 2);
            result = await resolver.next(state);
        }
        expect(driver.calls).toBe(2);
        expect(state.loads).toBe(2);
        expect(state.status).toEqual({ kind: 'exhausted', reason: 'max-loads' });
    });

    it('never loads with a cap of zero', async () => {
        const driver = new ScriptedDriver([endlessResult]);
        const resolver = new PaginationResolver(URLEBIRD, driver, { maxLoads: 0 });
        const state = resolver.begin('dance', PAGE_URL, firstPage);
        expect(await resolver.next(state)).toBeNull();
        expect(driver.calls).toBe(0);
    });

    it('ends when a load adds nothing new', async () => {
        const resolver = new PaginationResolver(URLEBIRD, new ScriptedDriver([endlessResult]), { maxLoads: 5 });
        const state = resolver.begin('dance', PAGE_URL, firstPage);
        const result = await resolver.next(state);
        expect(result).not.toBeNull();
        if (result) resolver.settle(state, result, 0, 2);
        expect(state.status).toEqual({ kind: 'exhausted', reason: 'no-new-entries' });
    });

    it('advances the previous token when the response carries none', async () => {
        const resolver = new PaginationResolver(URLEBIRD, new ScriptedDriver([]), { maxLoads: 5 });
        const state = resolver.begin('dance', PAGE_URL, firstPage);
        resolver.settle(state, { url: PAGE_URL, body: '', control: undefined }, 3, 3);
        expect(state.control?.params).toEqual({ hash: 'dance', id: '77', page: '3', cursor: '23' });
        expect(state.status).toEqual({ kind: 'more' });
    });

    it('reports a failed load as stopped early, not exhausted', async () => {
        const failure = new HttpError(503, URLEBIRD.loadMore.endpoint);
        failure.attempts = 3;
        const resolver = new PaginationResolver(URLEBIRD, new ScriptedDriver([failure]), { maxLoads: 5 });
        const state = resolver.begin('dance', PAGE_URL, firstPage);

        expect(await resolver.next(state)).toBeNull();
        expect(state.status).toEqual({
            kind: 'stopped-early',
            url: 'https://urlebird.com/hash_load_more',
            attempts: 3,
            lastStatus: 503,
            message: 'HTTP 503 for https://urlebird.com/hash_load_more',
        });
        expect(state.loads).toBe(0);
    });

    it('keeps the unreadable body of a malformed response', async () => {
        const debugStore = new MemoryDebugStore();
        const failure = new ParseError('bad json', URLEBIRD.loadMore.endpoint, '{oops');
        const resolver = new PaginationResolver(URLEBIRD, new ScriptedDriver([failure]), { maxLoads: 5, debugStore });
        const state = resolver.begin('dance', PAGE_URL, firstPage);

        await resolver.next(state);
        expect(state.status).toMatchObject({ kind: 'stopped-early', attempts: 1, lastStatus: null });
        expect(debugStore.artifacts.get('load-more-dance')).toBe('{oops');
    });

    it('rethrows errors that are not fetch or parse failures', async () => {
        const resolver = new PaginationResolver(URLEBIRD, new ScriptedDriver([new TypeError('bug')]), { maxLoads: 5 });
        const state = resolver.begin('dance', PAGE_URL, firstPage);
        await expect(resolver.next(state)).rejects.toThrow('bug');
    });
});
