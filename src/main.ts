#!/usr/bin/env node
import 'dotenv/config';
import { log, LogLevel, ProxyConfiguration } from 'crawlee';
import { BrowserFetcher, PlaywrightRenderer } from './browser.js';
import { ConfigError, resolveConfig, type RunConfig } from './config.js';
import { KeyValueDebugStore } from './debug-store.js';
import { errorMessage } from './errors.js';
import { HttpFetcher, PoliteFetcher, UserAgentPool, type Fetcher, type PolitenessOptions } from './fetcher.js';
import { HashtagScraper } from './orchestrator.js';
import { defaultOutputPath, enrichedOutputPath, formatSummary, RecordWriter, sidecarPath, writeStats } from './output.js';
import { AjaxLoadMoreDriver, ClickLoadMoreDriver, type LoadMoreDriver } from './pagination.js';
import { readRecordFile } from './record-reader.js';
import { SITES, type SiteConfig } from './sites.js';
import { summarizeRecords } from './stats.js';
import { RequestThrottle } from './throttle.js';
import type { VideoRecord } from './types.js';

/**
 * ---------------------------------------------------------------------------
 * urlebird hashtag crawler: entry point
 *
 * Role
 *  - CLI/env parsing, wiring of the fetch stack, output files. Site markup rules live in
 *    sites.ts, the crawl loop in orchestrator.ts.
 *
 * Usage
 *  urlebird-hashtag --hashtag dance [--start-date 2024-01-01] [--end-date 2024-01-31]
 *                   [--max-pages 5 | --max-loads 4] [--delay 2.0] [--proxy URL[,URL]]
 *                   [--batch-size 5] [--max-concurrent 3] [--skip-enrichment] [--two-stage]
 *                   [--concurrent --max-workers 3] [--fetcher http|browser]
 *                   [--format csv|json] [--output FILE] [--save-stats] [--incremental-save]
 *  Several hashtags: --hashtag dance,music  or as positional arguments.
 *  Enrichment only:  urlebird-hashtag --enrich-from output/<run>.stage1.csv [--format json]
 * ---------------------------------------------------------------------------
 */

// ===[ Log levels ]==========================================================
// env LOG_LEVEL=DEBUG|INFO|WARNING|WARN|ERROR|OFF
const LOG_LEVELS: Record<string, LogLevel> = {
    DEBUG: LogLevel.DEBUG,
    INFO: LogLevel.INFO,
    WARNING: LogLevel.WARNING,
    WARN: LogLevel.WARNING,
    ERROR: LogLevel.ERROR,
    OFF: LogLevel.OFF,
};

// ===[ Wiring ]==============================================================
type FetchStack = {
    fetcher: Fetcher;
    createDriver: () => LoadMoreDriver;
};

function buildFetchStack(config: RunConfig, site: SiteConfig): FetchStack {
    const proxyConfiguration = config.proxyUrls.length
        ? new ProxyConfiguration({ proxyUrls: config.proxyUrls })
        : undefined;
    const userAgents = new UserAgentPool();
    const politeness: PolitenessOptions = {
        throttle: new RequestThrottle(config.delayMs),
        maxAttempts: config.maxAttempts,
        baseDelayMs: config.retryBaseDelayMs,
        maxDelayMs: config.retryMaxDelayMs,
        timeoutMs: config.timeoutMs,
        userAgents,
    };

    if (config.fetcher === 'browser') {
        const renderer = new PlaywrightRenderer({
            browser: config.browser,
            headless: config.headless,
            timeoutMs: config.timeoutMs,
            proxyConfiguration,
        });
        const fetcher = new PoliteFetcher(new BrowserFetcher(renderer, userAgents.next()), politeness);
        return {
            fetcher,
            createDriver: () => new ClickLoadMoreDriver((ua) => renderer.newPage(ua), site, politeness),
        };
    }

    const fetcher = new PoliteFetcher(new HttpFetcher({ proxyConfiguration, timeoutMs: config.timeoutMs }), politeness);
    return { fetcher, createDriver: () => new AjaxLoadMoreDriver(fetcher, site) };
}

// ===[ Run ]=================================================================
let config: RunConfig;
try {
    config = resolveConfig(process.argv.slice(2));
} catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    log.error(e.message);
    log.info('usage: urlebird-hashtag --hashtag <tag>[,<tag>...] [options]  (see README.md)');
    process.exit(1);
}

log.setLevel(LOG_LEVELS[config.logLevel] ?? LogLevel.INFO);
log.info('run parameters', {
    ...config,
    proxyUrls: config.proxyUrls.length,
    startDate: config.startDate?.toISOString() ?? null,
    endDate: config.endDate?.toISOString() ?? null,
});

const site = SITES.urlebird;
let saved: VideoRecord[] | null = null;
if (config.enrichFrom) {
    try {
        saved = readRecordFile(config.enrichFrom, site);
    } catch (e) {
        log.error(`cannot read records from ${config.enrichFrom}: ${errorMessage(e)}`);
        process.exit(1);
    }
}
const hashtags = saved && !config.hashtags.length
    ? [...new Set(saved.map((r) => r.query).filter(Boolean))]
    : config.hashtags;
if (saved) log.info(`${saved.length} records read from ${config.enrichFrom}`);

const { fetcher, createDriver } = buildFetchStack(config, site);
const outputPath = config.output
    ?? (config.enrichFrom
        ? enrichedOutputPath(config.enrichFrom, config.format)
        : defaultOutputPath(config.outputDir, site.SITE_NAME, hashtags, config.format));
const writer = new RecordWriter(config.format, {
    site: site.SITE_NAME,
    hashtags,
    crawl_config: {
        max_loads: config.maxLoads,
        delay_ms: config.delayMs,
        fetcher: config.fetcher,
        enrich: config.enrich,
        two_stage: config.twoStage,
        concurrent: config.concurrent,
        start_date: config.startDate?.toISOString() ?? null,
        end_date: config.endDate?.toISOString() ?? null,
        enriched_from: config.enrichFrom,
    },
});

const scraper = new HashtagScraper(
    {
        hashtags,
        dateRange: { start: config.startDate, end: config.endDate },
        maxLoads: config.maxLoads,
        twoStage: config.twoStage,
        enrich: config.enrich,
        concurrent: config.concurrent,
        maxWorkers: config.maxWorkers,
        batchSize: config.batchSize,
        maxConcurrency: config.maxConcurrency,
        delayMs: config.delayMs,
        checkpointEvery: config.checkpointEvery,
    },
    {
        site,
        createDriver,
        detailFetcher: fetcher,
        debugStore: new KeyValueDebugStore(config.debugStore),
        onCheckpoint: (records) => writer.write(records, sidecarPath(outputPath, 'partial')),
        onIntermediate: (records) => writer.write(records, sidecarPath(outputPath, 'stage1'), true),
    },
);

process.once('SIGINT', () => {
    log.warning('SIGINT received: finishing in-flight requests, then writing what was collected');
    scraper.stop();
});

const result = await (saved ? scraper.resume(saved) : scraper.run()).finally(() => fetcher.close());

await writer.write(result.records, outputPath);
if (!result.records.length) log.warning('no videos collected; check the hashtag, the date range or the debug-pages store');

const summary = summarizeRecords(result.records, hashtags);
log.info(`summary\n${formatSummary(summary)}`);
if (config.saveStats) writeStats(sidecarPath(outputPath, 'stats', '.json'), result.stats, summary);

log.info('crawler finished.');
