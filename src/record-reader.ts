import fs from 'node:fs';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { ParseError } from './errors.js';
import { isTruncated, mergeHashtags } from './normalize.js';
import type { SiteConfig } from './sites.js';
import type { VideoRecord } from './types.js';

/**
 * ---------------------------------------------------------------------------
 * Record files → VideoRecord
 *
 * Reads back what output.ts writes (stage-1, partial or final files, CSV or JSON) so that the
 * enrichment pass can run again without scraping. CSV cells are text: empty = unknown.
 * Without a `needs_enrichment` column the flag is recomputed from the description.
 * Fields no file carries (rule names) come back empty.
 * ---------------------------------------------------------------------------
 */

// ===[ Schemas ]=============================================================
const isoDate = z.string().datetime({ offset: true }).transform((v) => new Date(v));
const text = z.string().default('');
const cell = z.string().default('').transform((v) => v.trim());

const csvRowSchema = z.object({
    url: z.string().url(),
    video_id: cell,
    scrape_time: isoDate,
    timestamp_raw: text,
    estimated_release_time: z.union([z.literal(''), isoDate]).default(''),
    views_raw: text,
    likes_raw: text,
    comments_raw: text,
    views: cell,
    likes: cell,
    comments: cell,
    author: text,
    author_url: text,
    description_and_hashtags: text,
    hashtags_str: text,
    needs_enrichment: z.enum(['true', 'false']).optional(),
});

const jsonRecordSchema = z.object({
    url: z.string().url(),
    video_id: z.string().nullable().default(null),
    scrape_time: isoDate,
    timestamp_raw: text,
    estimated_release_time: isoDate.nullable().default(null),
    views_raw: text,
    likes_raw: text,
    comments_raw: text,
    views: z.number().nullable().default(null),
    likes: z.number().nullable().default(null),
    comments: z.number().nullable().default(null),
    author: text,
    author_url: text,
    description_and_hashtags: text,
    hashtags: z.array(z.string()).default([]),
    needs_enrichment: z.boolean().optional(),
    tiktok_url: z.string().nullable().default(null),
    query: text,
});

const jsonFileSchema = z.array(z.object({ records: z.array(jsonRecordSchema) })).min(1);

type CommonFields = {
    url: string;
    videoId: string | null;
    scrapeTime: Date;
    timestampRaw: string;
    estimatedReleaseTime: Date | null;
    viewsRaw: string;
    likesRaw: string;
    commentsRaw: string;
    views: number | null;
    likes: number | null;
    comments: number | null;
    author: string;
    authorUrl: string;
    descriptionAndHashtags: string;
    hashtags: string[];
    needsEnrichment: boolean | undefined;
    tiktokUrl: string | null;
    query: string;
};

// ===[ Conversion ]==========================================================
function toRecord(f: CommonFields, site: SiteConfig): VideoRecord {
    const hashtags = mergeHashtags(f.hashtags);
    return {
        url: f.url,
        videoId: f.videoId,
        scrapeTime: f.scrapeTime,
        timestampRaw: f.timestampRaw,
        estimatedReleaseTime: f.estimatedReleaseTime,
        viewsRaw: f.viewsRaw,
        likesRaw: f.likesRaw,
        commentsRaw: f.commentsRaw,
        views: f.views,
        likes: f.likes,
        comments: f.comments,
        author: f.author,
        authorUrl: f.authorUrl,
        descriptionAndHashtags: f.descriptionAndHashtags,
        hashtags,
        hashtagSource: hashtags.length ? 'description' : 'none',
        needsEnrichment: f.needsEnrichment ?? isTruncated(f.descriptionAndHashtags, site.truncationMarkers),
        tiktokUrl: f.tiktokUrl ?? (f.author && f.videoId ? site.tiktokVideoUrl(f.author, f.videoId) : null),
        query: f.query,
        rules: {},
    };
}

const countOrNull = (value: string): number | null => {
    if (!value) return null;
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
};

function issuesOf(error: z.ZodError, where: (index: number) => string): string {
    return error.issues
        .slice(0, 5)
        .map((i) => {
            const [index, ...field] = i.path;
            const at = typeof index === 'number' ? `${where(index)} ${field.join('.')}` : i.path.join('.');
            return `${at}: ${i.message}`;
        })
        .join('; ');
}

// ===[ Parsers ]=============================================================
export function parseCsvRecords(content: string, site: SiteConfig, source = 'csv'): VideoRecord[] {
    let rows: unknown;
    try {
        rows = parse(content, { columns: true, skip_empty_lines: true, bom: true });
    } catch (e) {
        throw new ParseError(`${source}: not a CSV file`, source, undefined, { cause: e });
    }
    const result = z.array(csvRowSchema).safeParse(rows);
    // line 1 is the header
    if (!result.success) throw new ParseError(`${source}: ${issuesOf(result.error, (i) => `line ${i + 2}`)}`, source);

    return result.data.map((row) => toRecord({
        url: row.url,
        videoId: row.video_id || null,
        scrapeTime: row.scrape_time,
        timestampRaw: row.timestamp_raw,
        estimatedReleaseTime: row.estimated_release_time || null,
        viewsRaw: row.views_raw,
        likesRaw: row.likes_raw,
        commentsRaw: row.comments_raw,
        views: countOrNull(row.views),
        likes: countOrNull(row.likes),
        comments: countOrNull(row.comments),
        author: row.author,
        authorUrl: row.author_url,
        descriptionAndHashtags: row.description_and_hashtags,
        hashtags: row.hashtags_str.split(','),
        needsEnrichment: row.needs_enrichment === undefined ? undefined : row.needs_enrichment === 'true',
        tiktokUrl: null,
        query: '',
    }, site));
}

/** The `[{ meta, records }]` envelope; records of every element are concatenated. */
export function parseJsonRecords(content: string, site: SiteConfig, source = 'json'): VideoRecord[] {
    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (e) {
        throw new ParseError(`${source}: not a JSON file`, source, undefined, { cause: e });
    }
    const result = jsonFileSchema.safeParse(data);
    if (!result.success) throw new ParseError(`${source}: ${issuesOf(result.error, (i) => `element ${i}`)}`, source);

    return result.data.flatMap((chunk) => chunk.records).map((r) => toRecord({
        url: r.url,
        videoId: r.video_id,
        scrapeTime: r.scrape_time,
        timestampRaw: r.timestamp_raw,
        estimatedReleaseTime: r.estimated_release_time,
        viewsRaw: r.views_raw,
        likesRaw: r.likes_raw,
        commentsRaw: r.comments_raw,
        views: r.views,
        likes: r.likes,
        comments: r.comments,
        author: r.author,
        authorUrl: r.author_url,
        descriptionAndHashtags: r.description_and_hashtags,
        hashtags: r.hashtags,
        needsEnrichment: r.needs_enrichment,
        tiktokUrl: r.tiktok_url,
        query: r.query,
    }, site));
}

/** Format by extension: `.json` is JSON, anything else CSV. */
export function readRecordFile(filePath: string, site: SiteConfig): VideoRecord[] {
    const content = fs.readFileSync(filePath, 'utf-8');
    return path.extname(filePath).toLowerCase() === '.json'
        ? parseJsonRecords(content, site, filePath)
        : parseCsvRecords(content, site, filePath);
}
