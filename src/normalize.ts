import type { SiteConfig } from './sites.js';
import type { RawVideoEntry, VideoRecord } from './types.js';

// ===[ Counts ]==============================================================
const COUNT_MULTIPLIERS: Record<string, number> = { K: 1e3, M: 1e6, B: 1e9 };

/**
 * "1.2M" → 1200000, "950K" → 950000, "1,234 views" → 1234.
 * Anything else → null (a count that could not be read is not a zero).
 */
export function parseCount(raw: string | null | undefined): number | null {
    if (!raw) return null;
    const s = raw
        .replace(/\b(views?|likes?|comments?|plays?)\b/gi, '')
        .replace(/[,\s]/g, '')
        .toUpperCase();
    const m = s.match(/^(\d+(?:\.\d+)?)([KMB])?$/);
    if (!m) return null;
    const value = parseFloat(m[1]);
    return Math.round(m[2] ? value * COUNT_MULTIPLIERS[m[2]] : value);
}

// ===[ Timestamps ]==========================================================
const UNIT_SECONDS: Record<string, number> = {
    second: 1,
    sec: 1,
    minute: 60,
    min: 60,
    hour: 3_600,
    hr: 3_600,
    day: 86_400,
    week: 7 * 86_400,
    month: 30 * 86_400,
    year: 365 * 86_400,
};

const RELATIVE_RE = /^(\d+|an?|one)\s+(second|sec|minute|min|hour|hr|day|week|month|year)s?\s+ago$/;

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];
const MONTH_DAY_YEAR_RE = /^([a-z]{3})[a-z]*\.?\s+(\d{1,2}),?\s+(\d{4})$/;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Estimates when a video was published from the listing's timestamp text.
 *  - "3 days ago", "an hour ago", "just now" : relative to `scrapeTime`
 *    (month = 30 days, year = 365 days)
 *  - "Jun 7, 2023", "2023-06-07[T12:00:00Z]" : absolute, read as UTC
 * Returns null for anything else; the raw text is kept by the caller.
 */
export function parseRelativeTime(raw: string | null | undefined, scrapeTime: Date): Date | null {
    if (!raw) return null;
    const s = raw.trim().toLowerCase().replace(/\s+/g, ' ');
    if (!s) return null;
    if (s === 'just now' || s === 'now' || s === 'today') return new Date(scrapeTime.getTime());
    if (s === 'yesterday') return new Date(scrapeTime.getTime() - UNIT_SECONDS.day * 1000);

    const rel = s.match(RELATIVE_RE);
    if (rel) {
        const n = /^\d+$/.test(rel[1]) ? parseInt(rel[1], 10) : 1;
        return new Date(scrapeTime.getTime() - n * UNIT_SECONDS[rel[2]] * 1000);
    }

    const mdy = s.match(MONTH_DAY_YEAR_RE);
    if (mdy) {
        const month = MONTHS.indexOf(mdy[1]);
        if (month < 0) return null;
        return utcDate(parseInt(mdy[3], 10), month + 1, parseInt(mdy[2], 10));
    }

    const iso = raw.trim().match(ISO_DATE_RE);
    if (iso) {
        const [year, month, day, hour, minute, second] = [1, 2, 3, 4, 5, 6].map((i) => parseInt(iso[i] ?? '0', 10));
        const wallClock = utcDate(year, month, day, hour, minute, second);
        if (!wallClock || !iso[7]) return wallClock;
        return validDate(Date.parse(raw.trim().replace(' ', 'T')));
    }
    return null;
}

/** UTC date from calendar parts (month 1-12); null when a part is out of range ("2023-13-45"). */
function utcDate(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): Date | null {
    if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) return null;
    const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
    return date.getUTCDate() === day ? date : null;
}

function validDate(ms: number): Date | null {
    return Number.isNaN(ms) ? null : new Date(ms);
}

// ===[ URLs ]================================================================
/** Absolute http(s) URL of `href` against `base`, query kept; null for "#", javascript: and non-URLs. */
export function absoluteUrl(href: string | null | undefined, base: string): string | null {
    const h = (href ?? '').trim();
    if (!h || h.startsWith('javascript:') || h.startsWith('#')) return null;
    try {
        const u = new URL(h.startsWith('//') ? `https:${h}` : h, base);
        if (u.protocol !== 'http:' && u.protocol !== 'https:') return null;
        u.hash = '';
        return u.toString();
    } catch {
        return null;
    }
}

/** Absolute URL without query string or fragment; null when `href` is not a URL. */
export function canonicalUrl(href: string | null | undefined, base: string): string | null {
    const absolute = absoluteUrl(href, base);
    if (!absolute) return null;
    const u = new URL(absolute);
    u.search = '';
    return u.toString();
}

/** Trailing run of digits in the path: `/video/some-title-7251234567890123456/` → "7251234567890123456". */
export function extractVideoId(url: string | null | undefined): string | null {
    if (!url) return null;
    const path = url.split(/[?#]/)[0];
    return path.match(/(\d+)\/?$/)?.[1] ?? null;
}

// ===[ Description & hashtags ]==============================================
export function isTruncated(description: string, markers: readonly string[]): boolean {
    const d = description.trimEnd();
    return markers.some((m) => d.endsWith(m));
}

/**
 * Hashtags in order of appearance, without duplicates. When the text is truncated the last tag
 * may have been cut mid-word, so a tag that runs into the truncation marker is dropped.
 */
export function hashtagsFromText(text: string, markers: readonly string[] = []): string[] {
    let body = text.trimEnd();
    let truncated = false;
    for (const m of markers) {
        if (body.endsWith(m)) {
            body = body.slice(0, -m.length);
            truncated = true;
            break;
        }
    }
    const tags: string[] = [];
    for (const match of body.matchAll(/#([\p{L}\p{N}_]+)/gu)) {
        const end = (match.index ?? 0) + match[0].length;
        if (truncated && end === body.length) continue;
        tags.push(match[1]);
    }
    return mergeHashtags(tags);
}

export function mergeHashtags(...lists: string[][]): string[] {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const tag of lists.flat()) {
        const t = tag.replace(/^#/, '').trim();
        if (!t || seen.has(t.toLowerCase())) continue;
        seen.add(t.toLowerCase());
        out.push(t);
    }
    return out;
}

// ===[ Record ]==============================================================
export type NormalizeContext = {
    site: SiteConfig;
    scrapeTime: Date;
    query: string;
};

/**
 * Raw entry → VideoRecord. Returns null when the entry has no usable URL.
 * Hashtags are those of the description merged with the entry's hashtag links; the
 * embedded-JSON fallback is applied by the extractor, which still has the document.
 */
export function normalizeEntry(entry: RawVideoEntry, ctx: NormalizeContext): VideoRecord | null {
    const { site, scrapeTime } = ctx;
    const url = canonicalUrl(entry.url, site.baseUrl);
    if (!url) return null;

    const videoId = extractVideoId(url) ?? (entry.videoIdHint || null);
    const description = entry.description;
    const fromText = hashtagsFromText(description, site.truncationMarkers);
    const hashtags = mergeHashtags(fromText, entry.markupHashtags);
    const author = entry.author;

    return {
        url,
        videoId,
        scrapeTime,
        timestampRaw: entry.timestampRaw,
        estimatedReleaseTime: parseRelativeTime(entry.timestampRaw, scrapeTime),
        viewsRaw: entry.viewsRaw,
        likesRaw: entry.likesRaw,
        commentsRaw: entry.commentsRaw,
        views: parseCount(entry.viewsRaw),
        likes: parseCount(entry.likesRaw),
        comments: parseCount(entry.commentsRaw),
        author,
        authorUrl: canonicalUrl(entry.authorUrl, site.baseUrl) ?? '',
        descriptionAndHashtags: description,
        hashtags,
        hashtagSource: fromText.length ? 'description' : entry.markupHashtags.length ? 'markup' : 'none',
        needsEnrichment: isTruncated(description, site.truncationMarkers),
        tiktokUrl: author && videoId ? site.tiktokVideoUrl(author, videoId) : null,
        query: ctx.query,
        rules: entry.rules,
    };
}

// ===[ Date filter ]=========================================================
export type DateRange = {
    start: Date | null;
    end: Date | null;
};

/**
 * Bounds are inclusive. A date-only end ("2023-06-10") covers that whole UTC day.
 */
export function parseDateBound(value: string, edge: 'start' | 'end'): Date | null {
    const s = value.trim();
    const dateOnly = s.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (dateOnly) {
        const day = utcDate(parseInt(dateOnly[1], 10), parseInt(dateOnly[2], 10), parseInt(dateOnly[3], 10));
        if (!day || edge === 'start') return day;
        return new Date(day.getTime() + UNIT_SECONDS.day * 1000 - 1);
    }
    return validDate(Date.parse(s));
}

/** Undated records pass; the caller reports them for manual review. */
export function isWithinRange(date: Date | null, range: DateRange): boolean {
    if (!date) return true;
    const t = date.getTime();
    if (range.start && t < range.start.getTime()) return false;
    if (range.end && t > range.end.getTime()) return false;
    return true;
}
