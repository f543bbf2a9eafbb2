import { log, type Log } from 'crawlee';
import pLimit from 'p-limit';
import { FetchError, errorMessage } from './errors.js';
import type { DebugArtifactStore } from './debug-store.js';
import { extractDetail } from './extractor.js';
import type { Fetcher } from './fetcher.js';
import { sleep } from './retry.js';
import type { SiteConfig } from './sites.js';
import type { VideoRecord } from './types.js';

/**
 * Second pass over records whose description was cut off in the listing: fetch the video page,
 * take its full description and hashtags, clear the flag. A failure only costs that record.
 */

export type EnrichmentOptions = {
    batchSize: number;
    maxConcurrency: number;
    /** Pause between batches; the same value as the inter-request delay. */
    batchDelayMs: number;
    debugStore?: DebugArtifactStore;
    shouldStop?: () => boolean;
    sleep?: (ms: number) => Promise<void>;
    logger?: Log;
};

export type EnrichmentStats = {
    attempted: number;
    enriched: number;
    failed: number;
    /** Records that did not need enrichment. */
    skipped: number;
};

export function emptyEnrichmentStats(): EnrichmentStats {
    return { attempted: 0, enriched: 0, failed: 0, skipped: 0 };
}

export class Enricher {
    private readonly logger: Log;

    constructor(
        private readonly site: SiteConfig,
        private readonly fetcher: Fetcher,
        private readonly options: EnrichmentOptions,
    ) {
        this.logger = options.logger ?? log.child({ prefix: 'Enrichment' });
    }

    /** Mutates the flagged records in place. Running it again on the result is a no-op. */
    async enrich(records: readonly VideoRecord[]): Promise<EnrichmentStats> {
        const stats = emptyEnrichmentStats();
        const pending = records.filter((r) => r.needsEnrichment);
        stats.skipped = records.length - pending.length;
        if (!pending.length) return stats;

        const batchSize = Math.max(1, this.options.batchSize);
        const limit = pLimit(Math.max(1, this.options.maxConcurrency));
        const wait = this.options.sleep ?? sleep;
        const batches = Math.ceil(pending.length / batchSize);
        this.logger.info(`enriching ${pending.length} truncated descriptions in ${batches} batch(es)`);

        for (let b = 0; b < batches; b++) {
            if (b > 0 && this.options.batchDelayMs > 0) await wait(this.options.batchDelayMs);
            if (this.options.shouldStop?.()) {
                this.logger.warning('enrichment stopped before batch', { batch: b + 1, of: batches });
                break;
            }

            const batch = pending.slice(b * batchSize, (b + 1) * batchSize);
            const outcomes = await Promise.all(batch.map((record) => limit(() => this.enrichOne(record))));
            stats.attempted += batch.length;
            for (const ok of outcomes) {
                if (ok) stats.enriched += 1;
                else stats.failed += 1;
            }
            this.logger.debug(`batch ${b + 1}/${batches} done`, { ...stats });
        }
        return stats;
    }

    /** true when the record was enriched; the record is left untouched otherwise. */
    async enrichOne(record: VideoRecord): Promise<boolean> {
        if (!record.needsEnrichment) return true;
        try {
            const resp = await this.fetcher.fetch({ url: record.url });
            const detail = extractDetail(resp.body, this.site, record.videoId);
            if (!detail) {
                this.logger.warning('no description on video page', { url: record.url });
                await this.options.debugStore?.save(`video-${record.videoId ?? record.url}`, resp.body);
                return false;
            }
            record.descriptionAndHashtags = detail.description;
            if (detail.hashtags.length) {
                record.hashtags = detail.hashtags;
                record.hashtagSource = detail.hashtagSource;
            }
            record.needsEnrichment = false;
            record.rules = { ...record.rules, description: `detail:${detail.rule}` };
            return true;
        } catch (e) {
            if (!(e instanceof FetchError)) throw e;
            this.logger.warning('video page fetch failed', {
                url: e.url,
                attempts: e.attempts,
                lastStatus: e.lastStatus,
                error: errorMessage(e),
            });
            return false;
        }
    }
}
