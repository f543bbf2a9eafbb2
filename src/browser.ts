import { log, type ProxyConfiguration } from 'crawlee';
import { chromium, firefox, type Browser, type BrowserContext, type Page, type Response } from 'playwright';
import { HttpError, NetworkError, errorMessage } from './errors.js';
import { parseRetryAfter, proxySettings, type FetchRequest, type FetchResponse, type Fetcher } from './fetcher.js';

/**
 * ---------------------------------------------------------------------------
 * Rendered-browser transport
 *
 *  - One browser per run (firefox by default), one context per page so every page gets
 *    its own user agent and proxy.
 *  - Ad/analytics requests are aborted and `navigator.webdriver` is masked before any
 *    site script runs.
 *  - The cookie/consent banner is dismissed when present; it covers the load-more button.
 * ---------------------------------------------------------------------------
 */

const logger = log.child({ prefix: 'Browser' });

// ===[ Constants ]===========================================================
export const BLOCKED_DOMAINS = [
    'google-analytics.com', 'googletagmanager.com', 'doubleclick.net', 'googlesyndication.com',
    'adservice.google.com', 'criteo.com', 'adnxs.com', 'adform.net', 'bidswitch.net',
    'adsrvr.org', 'facebook.net', 'amazon-adsystem.com', 'taboola.com', 'outbrain.com',
    'pubmatic.com', 'rubiconproject.com', 'hotjar.com',
] as const;

const CONSENT_BUTTONS = [
    '#onetrust-accept-btn-handler',
    '.fc-cta-consent',
    'button.css-47sehv',
    'button:has-text("Accept")',
    'button:has-text("I agree")',
    'button:has-text("Got it")',
] as const;

export function isBlockedUrl(url: string): boolean {
    return BLOCKED_DOMAINS.some((domain) => url.includes(domain));
}

// ===[ Renderer ]============================================================
export type RendererOptions = {
    browser: 'firefox' | 'chromium';
    headless: boolean;
    timeoutMs: number;
    proxyConfiguration?: ProxyConfiguration;
};

/** A live page that stays open across load-more clicks. */
export class RenderedPage {
    constructor(
        readonly page: Page,
        private readonly context: BrowserContext,
        private readonly timeoutMs: number,
    ) {}

    /** Navigates and returns the rendered document. */
    async open(url: string): Promise<FetchResponse> {
        let response: Response | null;
        try {
            response = await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.timeoutMs });
        } catch (e) {
            throw new NetworkError(`navigation to ${url} failed: ${errorMessage(e)}`, url, { cause: e });
        }
        const status = response?.status() ?? 200;
        if (status < 200 || status >= 300) {
            throw new HttpError(status, url, parseRetryAfter(response?.headers()['retry-after']));
        }
        await this.dismissConsent();
        return {
            url: this.page.url(),
            status,
            contentType: response?.headers()['content-type'] ?? 'text/html',
            body: await this.page.content(),
        };
    }

    async html(): Promise<string> {
        return this.page.content();
    }

    async dismissConsent(): Promise<void> {
        for (const selector of CONSENT_BUTTONS) {
            const button = this.page.locator(selector).first();
            try {
                if (await button.isVisible({ timeout: 500 })) {
                    await button.click({ timeout: 2_000 });
                    logger.debug('consent banner dismissed', { selector });
                    return;
                }
            } catch (e) {
                logger.debug('consent button not clickable', { selector, error: errorMessage(e) });
            }
        }
    }

    /**
     * Clicks `selector` and waits until more than `previousCount` elements match `entrySelector`
     * (or the timeout passes). Returns the entry count afterwards.
     */
    async clickAndWait(selector: string, entrySelector: string, previousCount: number): Promise<number> {
        const url = this.page.url();
        try {
            const control = this.page.locator(selector).first();
            await control.scrollIntoViewIfNeeded({ timeout: this.timeoutMs });
            await control.click({ timeout: this.timeoutMs });
        } catch (e) {
            throw new NetworkError(`click on ${selector} failed: ${errorMessage(e)}`, url, { cause: e });
        }
        try {
            await this.page.waitForFunction(
                ([sel, count]) => document.querySelectorAll(sel).length > count,
                [entrySelector, previousCount] as const,
                { timeout: this.timeoutMs },
            );
        } catch (e) {
            logger.debug('entry count did not grow after click', { selector, error: errorMessage(e) });
        }
        await this.page.waitForLoadState('networkidle', { timeout: this.timeoutMs }).catch((e: unknown) => {
            logger.debug('network did not go idle', { error: errorMessage(e) });
        });
        return this.page.locator(entrySelector).count();
    }

    async close(): Promise<void> {
        await this.context.close();
    }
}

export class PlaywrightRenderer {
    private browser?: Promise<Browser>;

    constructor(private readonly options: RendererOptions) {}

    private launch(): Promise<Browser> {
        this.browser ??= (this.options.browser === 'chromium' ? chromium : firefox).launch({
            headless: this.options.headless,
        });
        return this.browser;
    }

    async newPage(userAgent: string): Promise<RenderedPage> {
        const browser = await this.launch();
        const proxyUrl = await this.options.proxyConfiguration?.newUrl();
        const context = await browser.newContext({
            userAgent,
            viewport: { width: 1280, height: 1800 },
            locale: 'en-US',
            ...(proxyUrl ? { proxy: proxySettings(proxyUrl) } : {}),
        });
        await context.addInitScript(() => {
            Object.defineProperty(navigator, 'webdriver', { get: () => false });
        });
        await context.route('**/*', (route) => {
            if (isBlockedUrl(route.request().url())) return route.abort();
            return route.continue();
        });
        const page = await context.newPage();
        return new RenderedPage(page, context, this.options.timeoutMs);
    }

    async close(): Promise<void> {
        if (!this.browser) return;
        const browser = await this.browser;
        this.browser = undefined;
        await browser.close();
    }
}

/** Fetcher over the renderer: every request navigates a fresh page (video pages for enrichment). */
export class BrowserFetcher implements Fetcher {
    constructor(
        private readonly renderer: PlaywrightRenderer,
        private readonly defaultUserAgent: string,
    ) {}

    async fetch(req: FetchRequest): Promise<FetchResponse> {
        if (req.method === 'POST') throw new Error(`rendered fetcher cannot POST ${req.url}`);
        const page = await this.renderer.newPage(req.userAgent ?? this.defaultUserAgent);
        try {
            const target = new URL(req.url);
            for (const [k, v] of Object.entries(req.params ?? {})) target.searchParams.set(k, v);
            return await page.open(target.toString());
        } finally {
            await page.close();
        }
    }

    close(): Promise<void> {
        return this.renderer.close();
    }
}
