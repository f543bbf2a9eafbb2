import { describe, expect, it } from 'vitest';
import { MemoryDebugStore } from './debug-store.js';
import { Enricher, type EnrichmentOptions } from './enrichment.js';
import { HttpError } from './errors.js';
import type { FetchRequest, FetchResponse, Fetcher } from './fetcher.js';
import { URLEBIRD } from './sites.js';
import { makeRecord, videoUrl } from './__fixtures__/pages.js';

/** Serves video pages from a map; tracks how many requests overlap. */
class VideoPageFetcher implements Fetcher {
    readonly requested: string[] = [];
    inFlight = 0;
    maxInFlight = 0;

    constructor(private readonly pages: Map<string, string | Error>) {}

    async fetch(req: FetchRequest): Promise<FetchResponse> {
        this.requested.push(req.url);
        this.inFlight += 1;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
            await new Promise((resolve) => setTimeout(resolve, 5));
            const page = this.pages.get(req.url);
            if (page instanceof Error) throw page;
            return { url: req.url, status: 200, contentType: 'text/html', body: page ?? '<html></html>' };
        } finally {
            this.inFlight -= 1;
        }
    }

    async close(): Promise<void> {}
}

const detailPage = (text: string) => `<html><body><div class="info2"><h1>${text}</h1></div></body></html>`;

const storyPages = (ids: number[]) => {
    const pages = new Map<string, string | Error>();
    for (const id of ids) pages.set(videoUrl(id), detailPage(`Story ${id}`));
    return pages;
};

const truncated = (id: number) => makeRecord({
    url: videoUrl(id),
    videoId: String(id),
    descriptionAndHashtags: `Story ${id} #dance...`,
    hashtags: ['dance'],
    hashtagSource: 'description',
    needsEnrichment: true,
    rules: { description: 'info3-span' },
});

const options = (overrides: Partial<EnrichmentOptions> = {}): EnrichmentOptions => ({
    batchSize: 5,
    maxConcurrency: 3,
    batchDelayMs: 0,
    ...overrides,
});

describe('Enricher', () => {
    it('replaces the truncated description and clears the flag', async () => {
        const fetcher = new VideoPageFetcher(new Map([[videoUrl(1), detailPage('Story 1 #dance all the way #ballet')]]));
        const record = truncated(1);
        const stats = await new Enricher(URLEBIRD, fetcher, options()).enrich([record]);

        expect(stats).toEqual({ attempted: 1, enriched: 1, failed: 0, skipped: 0 });
        expect(record).toMatchObject({
            descriptionAndHashtags: 'Story 1 #dance all the way #ballet',
            hashtags: ['dance', 'ballet'],
            hashtagSource: 'description',
            needsEnrichment: false,
            rules: { description: 'detail:info2-h1' },
        });
    });

    it('is a no-op on records that are already complete', async () => {
        const fetcher = new VideoPageFetcher(new Map([[videoUrl(1), detailPage('Story 1 in full')]]));
        const enricher = new Enricher(URLEBIRD, fetcher, options());
        const records = [truncated(1), makeRecord({ url: videoUrl(2) })];

        await enricher.enrich(records);
        const before = structuredClone(records);
        const second = await enricher.enrich(records);

        expect(second).toEqual({ attempted: 0, enriched: 0, failed: 0, skipped: 2 });
        expect(records).toEqual(before);
        expect(fetcher.requested).toEqual([videoUrl(1)]);
    });

    it('keeps hashtags from the listing when the video page has none', async () => {
        const fetcher = new VideoPageFetcher(new Map([[videoUrl(1), detailPage('Story 1 without tags')]]));
        const record = truncated(1);
        await new Enricher(URLEBIRD, fetcher, options()).enrich([record]);
        expect(record.descriptionAndHashtags).toBe('Story 1 without tags');
        expect(record.hashtags).toEqual(['dance']);
        expect(record.needsEnrichment).toBe(false);
    });

    it('leaves a record flagged when its page fails, without affecting the others', async () => {
        const fetcher = new VideoPageFetcher(new Map<string, string | Error>([
            [videoUrl(1), new HttpError(404, videoUrl(1))],
            [videoUrl(2), detailPage('Story 2 complete')],
        ]));
        const [first, second] = [truncated(1), truncated(2)];
        const stats = await new Enricher(URLEBIRD, fetcher, options()).enrich([first, second]);

        expect(stats).toEqual({ attempted: 2, enriched: 1, failed: 1, skipped: 0 });
        expect(first.needsEnrichment).toBe(true);
        expect(first.descriptionAndHashtags).toBe('Story 1 #dance...');
        expect(second.needsEnrichment).toBe(false);
    });

    it('saves the page when no description can be found on it', async () => {
        const debugStore = new MemoryDebugStore();
        const fetcher = new VideoPageFetcher(new Map([[videoUrl(3), '<p>captcha</p>']]));
        const record = truncated(3);
        const stats = await new Enricher(URLEBIRD, fetcher, options({ debugStore })).enrich([record]);

        expect(stats.failed).toBe(1);
        expect(record.needsEnrichment).toBe(true);
        expect(debugStore.artifacts.get('video-3')).toBe('<p>captcha</p>');
    });

    it('rethrows errors that are not fetch failures', async () => {
        const fetcher = new VideoPageFetcher(new Map([[videoUrl(1), new TypeError('bug')]]));
        await expect(new Enricher(URLEBIRD, fetcher, options()).enrich([truncated(1)])).rejects.toThrow('bug');
    });

    it('bounds concurrency and pauses between batches', async () => {
        const ids = [1, 2, 3, 4, 5];
        const fetcher = new VideoPageFetcher(storyPages(ids));
        const pauses: number[] = [];
        const stats = await new Enricher(URLEBIRD, fetcher, options({
            batchSize: 2,
            maxConcurrency: 1,
            batchDelayMs: 1500,
            sleep: async (ms) => {
                pauses.push(ms);
            },
        })).enrich(ids.map(truncated));

        expect(stats).toEqual({ attempted: 5, enriched: 5, failed: 0, skipped: 0 });
        expect(fetcher.maxInFlight).toBe(1);
        expect(pauses).toEqual([1500, 1500]);
    });

    it('runs a batch in parallel up to the concurrency limit', async () => {
        const ids = [1, 2, 3, 4];
        const fetcher = new VideoPageFetcher(storyPages(ids));
        await new Enricher(URLEBIRD, fetcher, options({ batchSize: 4, maxConcurrency: 2 })).enrich(ids.map(truncated));
        expect(fetcher.maxInFlight).toBe(2);
    });

    it('stops before the next batch when asked to', async () => {
        const ids = [1, 2, 3, 4];
        const fetcher = new VideoPageFetcher(storyPages(ids));
        let stop = false;
        const enricher = new Enricher(URLEBIRD, fetcher, options({
            batchSize: 2,
            shouldStop: () => stop,
            sleep: async () => {
                stop = true;
            },
            batchDelayMs: 10,
        }));
        const records = ids.map(truncated);
        const stats = await enricher.enrich(records);

        expect(stats).toEqual({ attempted: 2, enriched: 2, failed: 0, skipped: 0 });
        expect(records.map((r) => r.needsEnrichment)).toEqual([false, false, true, true]);
    });
});
