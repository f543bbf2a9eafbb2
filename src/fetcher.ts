import { log, type Log, type ProxyConfiguration } from 'crawlee';
import iconv from 'iconv-lite';
import { request as playwrightRequest, type APIRequestContext } from 'playwright';
import { HttpError, NetworkError, errorMessage } from './errors.js';
import { withRetry, withTimeout } from './retry.js';
import type { RequestThrottle } from './throttle.js';

/**
 * ---------------------------------------------------------------------------
 * Fetch layer
 *
 *  Fetcher        : the one capability the rest of the crawler depends on
 *  HttpFetcher    : plain requests through Playwright's APIRequestContext
 *                   (same client the list routes use for their AJAX fragments)
 *  PoliteFetcher  : wraps any Fetcher with the shared throttle, retries with
 *                   backoff and jitter, per-attempt timeout and user-agent rotation
 *
 * The rendered-browser Fetcher lives in browser.ts.
 * ---------------------------------------------------------------------------
 */

export type FetchRequest = {
    url: string;
    method?: 'GET' | 'POST';
    /** Query string for GET, urlencoded form body for POST. */
    params?: Record<string, string>;
    headers?: Record<string, string>;
    userAgent?: string;
};

export type FetchResponse = {
    /** Final URL after redirects. */
    url: string;
    status: number;
    contentType: string;
    body: string;
};

export interface Fetcher {
    fetch(req: FetchRequest): Promise<FetchResponse>;
    close(): Promise<void>;
}

// ===[ User agents ]=========================================================
export const DEFAULT_USER_AGENTS = [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
    'Mozilla/5.0 (X11; Linux x86_64; rv:125.0) Gecko/20100101 Firefox/125.0',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36 Edg/124.0.0.0',
] as const;

/** Opaque source of user agents; round-robin over a fixed list. */
export class UserAgentPool {
    private index = 0;

    constructor(private readonly agents: readonly string[] = DEFAULT_USER_AGENTS) {
        if (!agents.length) throw new Error('UserAgentPool needs at least one user agent');
    }

    next(): string {
        const ua = this.agents[this.index % this.agents.length];
        this.index += 1;
        return ua;
    }
}

// ===[ Charset ]=============================================================
export function detectCharset(ct?: string): string {
    if (!ct) return 'utf-8';
    const m = ct.match(/charset=["']?([^;"']+)/i);
    return (m?.[1] || 'utf-8').trim().toLowerCase();
}

export function decodeBody(buf: Buffer, contentType?: string): string {
    const charset = detectCharset(contentType);
    return iconv.encodingExists(charset) ? iconv.decode(buf, charset) : buf.toString('utf-8');
}

/** `Retry-After` in seconds or as an HTTP date. */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
    if (!value) return undefined;
    const seconds = Number(value);
    if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
    const at = Date.parse(value);
    return Number.isNaN(at) ? undefined : Math.max(0, at - now);
}

// ===[ Plain HTTP ]==========================================================
export type HttpFetcherOptions = {
    proxyConfiguration?: ProxyConfiguration;
    timeoutMs: number;
    extraHeaders?: Record<string, string>;
};

export function proxySettings(proxyUrl: string): { server: string; username?: string; password?: string } {
    const u = new URL(proxyUrl);
    return {
        server: `${u.protocol}//${u.host}`,
        ...(u.username ? { username: decodeURIComponent(u.username) } : {}),
        ...(u.password ? { password: decodeURIComponent(u.password) } : {}),
    };
}

export class HttpFetcher implements Fetcher {
    /** One request context per proxy URL ('' = direct). */
    private readonly contexts = new Map<string, Promise<APIRequestContext>>();

    constructor(private readonly options: HttpFetcherOptions) {}

    private context(proxyUrl: string | undefined): Promise<APIRequestContext> {
        const key = proxyUrl ?? '';
        let ctx = this.contexts.get(key);
        if (!ctx) {
            ctx = playwrightRequest.newContext({
                ...(proxyUrl ? { proxy: proxySettings(proxyUrl) } : {}),
                extraHTTPHeaders: {
                    'Accept-Language': 'en-US,en;q=0.9',
                    ...this.options.extraHeaders,
                },
                timeout: this.options.timeoutMs,
            });
            this.contexts.set(key, ctx);
        }
        return ctx;
    }

    async fetch(req: FetchRequest): Promise<FetchResponse> {
        const method = req.method ?? 'GET';
        const proxyUrl = await this.options.proxyConfiguration?.newUrl();
        const headers = { ...req.headers, ...(req.userAgent ? { 'User-Agent': req.userAgent } : {}) };

        let status: number;
        let contentType: string;
        let finalUrl: string;
        let buf: Buffer;
        let retryAfter: string | undefined;
        try {
            const ctx = await this.context(proxyUrl);
            const resp = await ctx.fetch(req.url, {
                method,
                headers,
                ...(method === 'GET' ? { params: req.params } : { form: req.params ?? {} }),
                timeout: this.options.timeoutMs,
                failOnStatusCode: false,
                maxRedirects: 5,
            });
            const respHeaders = resp.headers();
            status = resp.status();
            contentType = respHeaders['content-type'] ?? '';
            retryAfter = respHeaders['retry-after'];
            finalUrl = resp.url();
            buf = await resp.body();
        } catch (e) {
            throw new NetworkError(`${method} ${req.url} failed: ${errorMessage(e)}`, req.url, { cause: e });
        }

        if (status < 200 || status >= 300) throw new HttpError(status, req.url, parseRetryAfter(retryAfter));
        return { url: finalUrl, status, contentType, body: decodeBody(buf, contentType) };
    }

    async close(): Promise<void> {
        const contexts = [...this.contexts.values()];
        this.contexts.clear();
        await Promise.all(contexts.map(async (ctx) => (await ctx).dispose()));
    }
}

// ===[ Politeness ]==========================================================
export type PolitenessOptions = {
    throttle: RequestThrottle;
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    timeoutMs: number;
    userAgents: UserAgentPool;
    sleep?: (ms: number) => Promise<void>;
    logger?: Log;
};

/**
 * Every attempt waits for a throttle slot, gets a fresh user agent and its own timeout.
 * After the last attempt the NetworkError/HttpError escapes with `attempts` set.
 */
export async function politely<T>(
    label: string,
    url: string,
    options: PolitenessOptions,
    attemptFn: (userAgent: string, attempt: number) => Promise<T>,
): Promise<T> {
    const logger = options.logger ?? log;
    return withRetry(
        (attempt) => options.throttle.schedule(() => withTimeout(
            attemptFn(options.userAgents.next(), attempt),
            options.timeoutMs,
            () => new NetworkError(`${label} ${url} timed out after ${options.timeoutMs}ms`, url),
        )),
        {
            maxAttempts: options.maxAttempts,
            baseDelayMs: options.baseDelayMs,
            maxDelayMs: options.maxDelayMs,
            sleep: options.sleep,
            onRetry: (error, attempt, delayMs) => {
                logger.warning(`${label} failed, retrying`, {
                    url,
                    attempt,
                    delayMs,
                    error: errorMessage(error),
                });
            },
        },
    );
}

export class PoliteFetcher implements Fetcher {
    constructor(
        private readonly inner: Fetcher,
        private readonly options: PolitenessOptions,
    ) {}

    fetch(req: FetchRequest): Promise<FetchResponse> {
        return politely(req.method ?? 'GET', req.url, this.options, (userAgent) =>
            this.inner.fetch({ ...req, userAgent: req.userAgent ?? userAgent }),
        );
    }

    close(): Promise<void> {
        return this.inner.close();
    }
}
