import fs from 'node:fs';
import path from 'node:path';
import { log } from 'crawlee';
import { stringify } from 'csv-stringify/sync';
import type { ScrapeStats, RecordSummary } from './stats.js';
import type { VideoRecord } from './types.js';

// ===[ Columns ]=============================================================
export const OUTPUT_COLUMNS = [
    'url',
    'video_id',
    'scrape_time',
    'timestamp_raw',
    'estimated_release_time',
    'views_raw',
    'likes_raw',
    'comments_raw',
    'views',
    'likes',
    'comments',
    'author',
    'author_url',
    'description_and_hashtags',
    'hashtags_str',
] as const;

export const INTERMEDIATE_COLUMNS = [...OUTPUT_COLUMNS, 'needs_enrichment'] as const;

export type OutputColumn = (typeof INTERMEDIATE_COLUMNS)[number];
export type OutputRow = Record<OutputColumn, string>;
export type OutputFormat = 'csv' | 'json';

const iso = (d: Date | null): string => (d ? d.toISOString() : '');
const num = (n: number | null): string => (n === null ? '' : String(n));

export function toRow(r: VideoRecord): OutputRow {
    return {
        url: r.url,
        video_id: r.videoId ?? '',
        scrape_time: iso(r.scrapeTime),
        timestamp_raw: r.timestampRaw,
        estimated_release_time: iso(r.estimatedReleaseTime),
        views_raw: r.viewsRaw,
        likes_raw: r.likesRaw,
        comments_raw: r.commentsRaw,
        views: num(r.views),
        likes: num(r.likes),
        comments: num(r.comments),
        author: r.author,
        author_url: r.authorUrl,
        description_and_hashtags: r.descriptionAndHashtags,
        hashtags_str: r.hashtags.join(','),
        needs_enrichment: r.needsEnrichment ? 'true' : 'false',
    };
}

export function toCsv(records: readonly VideoRecord[], intermediate = false): string {
    const columns = intermediate ? INTERMEDIATE_COLUMNS : OUTPUT_COLUMNS;
    return stringify(records.map(toRow), { header: true, columns: [...columns] });
}

/** JSON keeps typed values: numbers stay numbers, unparseable ones are null. */
export function toJsonRecord(r: VideoRecord) {
    return {
        url: r.url,
        video_id: r.videoId,
        scrape_time: iso(r.scrapeTime),
        timestamp_raw: r.timestampRaw,
        estimated_release_time: r.estimatedReleaseTime ? iso(r.estimatedReleaseTime) : null,
        views_raw: r.viewsRaw,
        likes_raw: r.likesRaw,
        comments_raw: r.commentsRaw,
        views: r.views,
        likes: r.likes,
        comments: r.comments,
        author: r.author,
        author_url: r.authorUrl,
        description_and_hashtags: r.descriptionAndHashtags,
        hashtags: r.hashtags,
        hashtags_str: r.hashtags.join(','),
        needs_enrichment: r.needsEnrichment,
        tiktok_url: r.tiktokUrl,
        query: r.query,
    };
}

export type OutputMeta = {
    site: string;
    hashtags: string[];
    crawled_at: string;
    crawl_config: Record<string, unknown>;
};

export function toJson(records: readonly VideoRecord[], meta: OutputMeta): string {
    const finalOutput = [{ meta: { ...meta, total_videos: records.length }, records: records.map(toJsonRecord) }];
    return JSON.stringify(finalOutput, null, 2);
}

// ===[ Paths ]===============================================================
const pad = (n: number): string => n.toString().padStart(2, '0');

/** `<dir>/<site>_<tag>[+<tag>…]_<YYYY-MM-DD>_<HH-mm-ss>.<ext>` (local time). */
export function defaultOutputPath(
    dir: string,
    site: string,
    hashtags: readonly string[],
    format: OutputFormat,
    now: Date = new Date(),
): string {
    const formattedDate = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
    const formattedTime = `${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;
    const tags = hashtags.map((t) => t.replace(/^#/, '').replace(/[^\p{L}\p{N}_-]+/gu, '')).join('+');
    return path.join(dir, `${site}_${tags}_${formattedDate}_${formattedTime}.${format}`);
}

/** `out/x.csv` + `stage1` → `out/x.stage1.csv`. */
export function sidecarPath(outputPath: string, suffix: string, ext?: string): string {
    const parsed = path.parse(outputPath);
    return path.join(parsed.dir, `${parsed.name}.${suffix}${ext ?? parsed.ext}`);
}

/** Output of `--enrich-from`: `out/x.stage1.csv` → `out/x.csv`, any other file → `out/x.enriched.<ext>`. */
export function enrichedOutputPath(inputPath: string, format: OutputFormat): string {
    const parsed = path.parse(inputPath);
    const name = parsed.name.endsWith('.stage1') ? parsed.name.slice(0, -'.stage1'.length) : `${parsed.name}.enriched`;
    return path.join(parsed.dir, `${name}.${format}`);
}

// ===[ Writers ]=============================================================
function writeFile(filePath: string, content: string): void {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(filePath, content);
}

export class RecordWriter {
    constructor(
        private readonly format: OutputFormat,
        private readonly meta: Omit<OutputMeta, 'crawled_at'>,
    ) {}

    render(records: readonly VideoRecord[], intermediate = false): string {
        if (this.format === 'csv') return toCsv(records, intermediate);
        return toJson(records, { ...this.meta, crawled_at: new Date().toISOString() });
    }

    async write(records: readonly VideoRecord[], destination: string, intermediate = false): Promise<void> {
        writeFile(destination, this.render(records, intermediate));
        log.info(`${records.length} records written to ${destination}`);
    }
}

export function writeStats(destination: string, stats: ScrapeStats, summary: RecordSummary): void {
    writeFile(destination, JSON.stringify({ summary, run: stats }, null, 2));
    log.info(`statistics written to ${destination}`);
}

export function formatSummary(summary: RecordSummary): string {
    const lines = [
        `videos: ${summary.totalVideos}`,
        `views: avg ${summary.averageViews ?? '-'}, max ${summary.maxViews ?? '-'}`,
        `likes: avg ${summary.averageLikes ?? '-'}, max ${summary.maxLikes ?? '-'}`,
    ];
    if (summary.topAuthors.length) {
        lines.push(`top authors: ${summary.topAuthors.map((a) => `${a.name} (${a.count})`).join(', ')}`);
    }
    if (summary.relatedHashtags.length) {
        lines.push(`related hashtags: ${summary.relatedHashtags.map((t) => `#${t.name} (${t.count})`).join(', ')}`);
    }
    return lines.join('\n');
}
