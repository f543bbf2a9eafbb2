import { log, type Log } from 'crawlee';
import pLimit from 'p-limit';
import { FetchError, errorMessage } from './errors.js';
import type { DebugArtifactStore } from './debug-store.js';
import { Enricher, emptyEnrichmentStats, type EnrichmentStats } from './enrichment.js';
import { countEntries, extractRecords } from './extractor.js';
import type { FetchResponse, Fetcher } from './fetcher.js';
import { isWithinRange, type DateRange } from './normalize.js';
import { PaginationResolver, type LoadMoreDriver } from './pagination.js';
import type { SiteConfig } from './sites.js';
import { countSelectorHits, type QueryStats, type ScrapeStats } from './stats.js';
import type { VideoRecord } from './types.js';

/**
 * ---------------------------------------------------------------------------
 * Orchestrator
 *
 * One run = one or more hashtag queries. Per query:
 *   hashtag page → extract → normalize → collect (unique by url)
 *   → while the resolver has more: load more → extract → ...
 * then enrichment, date filtering and statistics.
 *
 * Modes are configuration, not separate entry points:
 *   enrich && twoStage  : every query first, intermediate records emitted, then enrichment
 *   enrich && !twoStage : each document's truncated records are enriched right away
 *   concurrent          : queries run on a pool of `maxWorkers`, sharing one throttle
 * ---------------------------------------------------------------------------
 */

export type ScrapeConfig = {
    hashtags: string[];
    dateRange: DateRange;
    maxLoads: number;
    twoStage: boolean;
    enrich: boolean;
    concurrent: boolean;
    maxWorkers: number;
    batchSize: number;
    maxConcurrency: number;
    /** Inter-request delay, reused as the pause between enrichment batches. */
    delayMs: number;
    /** Write a checkpoint every N documents; 0 disables. */
    checkpointEvery: number;
};

export type ScrapeDependencies = {
    site: SiteConfig;
    /** One driver per query; it owns that query's page or session. */
    createDriver: () => LoadMoreDriver;
    detailFetcher: Fetcher;
    debugStore?: DebugArtifactStore;
    now?: () => Date;
    sleep?: (ms: number) => Promise<void>;
    onCheckpoint?: (records: readonly VideoRecord[]) => Promise<void>;
    /** Two-stage mode: receives the records before enrichment touches them. */
    onIntermediate?: (records: readonly VideoRecord[]) => Promise<void>;
    logger?: Log;
};

export type ScrapeResult = {
    records: VideoRecord[];
    stats: ScrapeStats;
};

// ===[ Collector ]===========================================================
/** Run-wide record set keyed by canonical URL; first occurrence wins. */
export class RecordCollector {
    private readonly byUrl = new Map<string, VideoRecord>();
    duplicates = 0;

    add(record: VideoRecord): boolean {
        if (this.byUrl.has(record.url)) {
            this.duplicates += 1;
            return false;
        }
        this.byUrl.set(record.url, record);
        return true;
    }

    get size(): number {
        return this.byUrl.size;
    }

    records(): VideoRecord[] {
        return [...this.byUrl.values()];
    }
}

// ===[ Orchestrator ]========================================================
export class HashtagScraper {
    private readonly logger: Log;
    private readonly now: () => Date;
    private readonly enricher: Enricher;
    private stopRequested = false;
    private documentsSinceCheckpoint = 0;

    constructor(
        private readonly config: ScrapeConfig,
        private readonly deps: ScrapeDependencies,
    ) {
        this.logger = deps.logger ?? log.child({ prefix: 'Scraper' });
        this.now = deps.now ?? (() => new Date());
        this.enricher = new Enricher(deps.site, deps.detailFetcher, {
            batchSize: config.batchSize,
            maxConcurrency: config.maxConcurrency,
            batchDelayMs: config.delayMs,
            debugStore: deps.debugStore,
            shouldStop: () => this.stopRequested,
            sleep: deps.sleep,
        });
    }

    /** Cooperative stop: nothing new is started, in-flight requests finish. */
    stop(): void {
        this.stopRequested = true;
    }

    private emptyStats(): ScrapeStats {
        return {
            startedAt: this.now().toISOString(),
            finishedAt: null,
            queries: [],
            recordsExtracted: 0,
            duplicatesSkipped: 0,
            discardedWithoutUrl: 0,
            filteredByDate: 0,
            undatedForReview: [],
            enrichment: emptyEnrichmentStats(),
            selectorHits: {},
        };
    }

    async run(): Promise<ScrapeResult> {
        const collector = new RecordCollector();
        const stats = this.emptyStats();

        const runQuery = async (hashtag: string): Promise<void> => {
            if (this.stopRequested) return;
            try {
                stats.queries.push(await this.scrapeHashtag(hashtag, collector, stats));
            } catch (e) {
                this.logger.exception(e instanceof Error ? e : new Error(String(e)), `query #${hashtag} aborted, stopping the run`);
                this.stop();
            }
        };

        if (this.config.concurrent && this.config.hashtags.length > 1) {
            const limit = pLimit(Math.max(1, this.config.maxWorkers));
            await Promise.all(this.config.hashtags.map((tag) => limit(() => runQuery(tag))));
        } else {
            for (const tag of this.config.hashtags) await runQuery(tag);
        }

        const all = collector.records();
        stats.duplicatesSkipped += collector.duplicates;

        if (this.config.enrich && this.config.twoStage && !this.stopRequested) {
            await this.emit('intermediate', this.deps.onIntermediate, all);
            await this.runEnrichment(all, stats.enrichment);
        } else if (!this.config.enrich) {
            stats.enrichment.skipped = all.length;
        }

        return this.finish(all, stats);
    }

    /**
     * Stage 2 on its own, over records read back from a stage-1 file: the flagged ones are
     * enriched, then the date filter and statistics run as at the end of a scrape.
     */
    async resume(saved: readonly VideoRecord[]): Promise<ScrapeResult> {
        const stats = this.emptyStats();
        const collector = new RecordCollector();
        for (const record of saved) collector.add(record);
        stats.recordsExtracted = saved.length;
        stats.duplicatesSkipped = collector.duplicates;

        const all = collector.records();
        if (this.config.enrich) await this.runEnrichment(all, stats.enrichment);
        else stats.enrichment.skipped = all.length;
        return this.finish(all, stats);
    }

    private finish(all: readonly VideoRecord[], stats: ScrapeStats): ScrapeResult {
        const records = this.applyDateFilter(all, stats);
        stats.selectorHits = countSelectorHits(records);
        stats.finishedAt = this.now().toISOString();
        this.logger.info(`run finished: ${records.length} records`, {
            extracted: stats.recordsExtracted,
            duplicates: stats.duplicatesSkipped,
            filteredByDate: stats.filteredByDate,
            undated: stats.undatedForReview.length,
            enrichment: stats.enrichment,
        });
        return { records, stats };
    }

    private async scrapeHashtag(hashtag: string, collector: RecordCollector, stats: ScrapeStats): Promise<QueryStats> {
        const url = this.deps.site.hashtagUrl(hashtag);
        const query: QueryStats = {
            hashtag,
            url,
            documents: 0,
            loads: 0,
            recordsAdded: 0,
            status: { kind: 'exhausted', reason: 'no-control' },
        };
        const driver = this.deps.createDriver();
        const resolver = new PaginationResolver(this.deps.site, driver, {
            maxLoads: this.config.maxLoads,
            debugStore: this.deps.debugStore,
        });
        this.logger.info(`query start: #${hashtag}`, { url, maxLoads: this.config.maxLoads });

        try {
            let first: FetchResponse;
            try {
                first = await driver.open(url);
            } catch (e) {
                if (!(e instanceof FetchError)) throw e;
                query.status = {
                    kind: 'stopped-early',
                    url: e.url,
                    attempts: e.attempts,
                    lastStatus: e.lastStatus,
                    message: e.message,
                };
                this.logger.error(`hashtag page failed for #${hashtag}`, query.status);
                return query;
            }

            const added = await this.ingest(first.body, hashtag, first.url, collector, stats);
            query.documents += 1;
            query.recordsAdded += added.length;

            const state = resolver.begin(hashtag, first.url, first.body);
            while (!this.stopRequested) {
                const result = await resolver.next(state);
                if (!result) break;
                const fresh = await this.ingest(result.body, hashtag, result.url, collector, stats);
                query.documents += 1;
                query.recordsAdded += fresh.length;
                resolver.settle(state, result, fresh.length, countEntries(result.body, this.deps.site));
                this.logger.info(`#${hashtag} load ${state.loads}: +${fresh.length} records`, { total: collector.size });
            }
            query.loads = state.loads;
            query.status = state.status;
            return query;
        } finally {
            await driver.close();
            this.logger.info(`query done: #${hashtag}`, {
                documents: query.documents,
                records: query.recordsAdded,
                status: query.status.kind,
                ...(query.status.kind === 'exhausted' ? { reason: query.status.reason } : {}),
            });
        }
    }

    /** Extracts one document, keeps the records new to the run and returns them. */
    private async ingest(
        html: string,
        hashtag: string,
        url: string,
        collector: RecordCollector,
        stats: ScrapeStats,
    ): Promise<VideoRecord[]> {
        const extraction = extractRecords(html, { site: this.deps.site, scrapeTime: this.now(), query: hashtag });
        stats.recordsExtracted += extraction.records.length;
        stats.discardedWithoutUrl += extraction.discarded;
        stats.duplicatesSkipped += extraction.duplicates;
        if (!extraction.container) {
            this.logger.warning('no video entries found in document', { url });
            await this.deps.debugStore?.save(`entries-${hashtag}`, html);
        }

        const fresh = extraction.records.filter((record) => collector.add(record));
        if (this.config.enrich && !this.config.twoStage && fresh.length) {
            await this.runEnrichment(fresh, stats.enrichment);
        }

        this.documentsSinceCheckpoint += 1;
        if (this.config.checkpointEvery > 0 && this.documentsSinceCheckpoint >= this.config.checkpointEvery) {
            this.documentsSinceCheckpoint = 0;
            await this.emit('checkpoint', this.deps.onCheckpoint, collector.records());
        }
        return fresh;
    }

    private async runEnrichment(records: readonly VideoRecord[], into: EnrichmentStats): Promise<void> {
        const result = await this.enricher.enrich(records);
        into.attempted += result.attempted;
        into.enriched += result.enriched;
        into.failed += result.failed;
        into.skipped += result.skipped;
    }

    private applyDateFilter(records: readonly VideoRecord[], stats: ScrapeStats): VideoRecord[] {
        const kept: VideoRecord[] = [];
        for (const record of records) {
            if (!isWithinRange(record.estimatedReleaseTime, this.config.dateRange)) {
                stats.filteredByDate += 1;
                continue;
            }
            if (!record.estimatedReleaseTime) stats.undatedForReview.push(record.url);
            kept.push(record);
        }
        if (stats.undatedForReview.length) {
            this.logger.warning(`${stats.undatedForReview.length} records have no usable date, kept for manual review`);
        }
        return kept;
    }

    private async emit(
        what: string,
        sink: ((records: readonly VideoRecord[]) => Promise<void>) | undefined,
        records: readonly VideoRecord[],
    ): Promise<void> {
        if (!sink) return;
        try {
            await sink(records);
        } catch (e) {
            this.logger.warning(`could not write ${what} records`, { error: errorMessage(e) });
        }
    }
}
