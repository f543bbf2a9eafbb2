import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { log } from 'crawlee';
import { applyStrategy, cleanText } from './selectors.js';
import type { SiteConfig } from './sites.js';
import type { EntryField, HashtagSource, RawVideoEntry, VideoRecord } from './types.js';
import { hashtagsFromText, mergeHashtags, normalizeEntry, type NormalizeContext } from './normalize.js';

/**
 * ---------------------------------------------------------------------------
 * Record extractor
 *
 *  - Finds the repeating entry containers of a hashtag document or load-more fragment.
 *  - Runs each field's selector strategy (sites.ts) and remembers which rule answered.
 *  - Entries without a video URL are dropped and counted; other gaps stay empty.
 *  - Hashtags: description text merged with hashtag links; embedded JSON only when both are empty.
 * ---------------------------------------------------------------------------
 */

const logger = log.child({ prefix: 'Extractor' });

export type ExtractionResult = {
    entries: RawVideoEntry[];
    /** Selector that located the containers, null when none matched. */
    container: string | null;
    discarded: number;
};

export type RecordExtraction = {
    records: VideoRecord[];
    container: string | null;
    discarded: number;
    duplicates: number;
};

export type DetailExtraction = {
    description: string;
    hashtags: string[];
    hashtagSource: HashtagSource;
    rule: string;
};

// ===[ Containers ]==========================================================
function findContainers($: CheerioAPI, site: SiteConfig): { nodes: Element[]; selector: string | null } {
    for (const selector of site.entry.containers) {
        const nodes = $<Element, string>(selector).not(site.entry.exclude).toArray();
        if (nodes.length) return { nodes, selector };
    }
    return { nodes: [], selector: null };
}

export function countEntries(html: string, site: SiteConfig): number {
    return findContainers(cheerio.load(html), site).nodes.length;
}

/**
 * Markup of the entries past the first `skip` of a document, followed by its inline scripts
 * (they may carry the hashtags of those entries). Turns a page that grows in place into the
 * fragment of what was appended.
 */
export function entriesAfter(html: string, site: SiteConfig, skip: number): string {
    const $ = cheerio.load(html);
    const appended = findContainers($, site).nodes.slice(skip);
    if (!appended.length) return '';
    return [...appended, ...$('script:not([src])').toArray()].map((el) => $.html(el)).join('\n');
}

// ===[ Entries ]=============================================================
function hashtagLinkTexts(scope: Cheerio<Element>, $: CheerioAPI, selector: string): string[] {
    const tags: string[] = [];
    for (const el of scope.find(selector).toArray()) {
        const link = $(el);
        const text = cleanText(link.text()).replace(/^#/, '');
        const fromHref = (link.attr('href') ?? '').match(/\/hash\/([^/?#]+)/)?.[1];
        const tag = text || (fromHref ? decodeURIComponent(fromHref) : '');
        if (tag) tags.push(tag);
    }
    return tags;
}

function extractEntry(scope: Cheerio<Element>, $: CheerioAPI, site: SiteConfig): RawVideoEntry {
    const rules: Partial<Record<EntryField, string>> = {};
    const pick = (field: EntryField): string => {
        const hit = applyStrategy(site.fields[field], scope, $);
        if (!hit) return '';
        rules[field] = hit.rule;
        return hit.value;
    };
    return {
        url: pick('url'),
        videoIdHint: pick('videoId'),
        author: pick('author'),
        authorUrl: pick('authorUrl'),
        description: pick('description'),
        timestampRaw: pick('timestamp'),
        viewsRaw: pick('views'),
        likesRaw: pick('likes'),
        commentsRaw: pick('comments'),
        markupHashtags: hashtagLinkTexts(scope, $, site.hashtagLinks),
        rules,
    };
}

export function extractEntriesFrom($: CheerioAPI, site: SiteConfig): ExtractionResult {
    const { nodes, selector } = findContainers($, site);
    const entries: RawVideoEntry[] = [];
    let discarded = 0;
    for (const el of nodes) {
        const entry = extractEntry($(el), $, site);
        if (!entry.url) {
            discarded += 1;
            continue;
        }
        entries.push(entry);
    }
    return { entries, container: selector, discarded };
}

export function extractEntries(html: string, site: SiteConfig): ExtractionResult {
    return extractEntriesFrom(cheerio.load(html), site);
}

/**
 * Document → normalized records, unique by canonical URL within the document.
 * Records still without hashtags get them from an embedded JSON payload, if the page has one.
 */
export function extractRecords(html: string, ctx: NormalizeContext): RecordExtraction {
    const $ = cheerio.load(html);
    const { entries, container, discarded } = extractEntriesFrom($, ctx.site);
    const seen = new Set<string>();
    const records: VideoRecord[] = [];
    let unusable = discarded;
    let duplicates = 0;
    let embedded: Map<string, string[]> | undefined;

    for (const entry of entries) {
        const record = normalizeEntry(entry, ctx);
        if (!record) {
            unusable += 1;
            continue;
        }
        if (seen.has(record.url)) {
            duplicates += 1;
            continue;
        }
        seen.add(record.url);

        if (!record.hashtags.length && record.videoId) {
            embedded ??= embeddedHashtags($);
            const tags = embedded.get(record.videoId);
            if (tags?.length) {
                record.hashtags = tags;
                record.hashtagSource = 'embedded-json';
            }
        }
        records.push(record);
    }
    logger.debug(`extracted ${records.length} records`, { container, discarded: unusable, duplicates });
    return { records, container, discarded: unusable, duplicates };
}

// ===[ Video page ]==========================================================
/** Full description of a video page, or null when no description selector matched. */
export function extractDetail(html: string, site: SiteConfig, videoId: string | null): DetailExtraction | null {
    const $ = cheerio.load(html);
    const hit = applyStrategy(site.detail.description, $.root().children(), $);
    if (!hit) return null;

    const fromText = hashtagsFromText(hit.value);
    const fromLinks = hashtagLinkTexts($.root().children(), $, site.detail.hashtagLinks);
    if (fromText.length || fromLinks.length) {
        return {
            description: hit.value,
            hashtags: mergeHashtags(fromText, fromLinks),
            hashtagSource: fromText.length ? 'description' : 'markup',
            rule: hit.rule,
        };
    }
    const embedded = embeddedHashtags($);
    const hashtags = (videoId ? embedded.get(videoId) : undefined) ?? embedded.get('') ?? [];
    return {
        description: hit.value,
        hashtags,
        hashtagSource: hashtags.length ? 'embedded-json' : 'none',
        rule: hit.rule,
    };
}

// ===[ Embedded JSON ]=======================================================
const ID_KEYS = ['video_id', 'videoId', 'itemId', 'aweme_id', 'id'] as const;
const ASSIGNMENT_HEAD_RE = /(?:window\.[\w$]+|(?:var|let|const)\s+[\w$]+)\s*=\s*(?=\{)/g;

/** The `{...}` literal opening at `start`, closed by brace depth; braces inside strings do not count. */
function objectLiteralAt(text: string, start: number): string | null {
    let depth = 0;
    let quote: string | null = null;
    for (let i = start; i < text.length; i++) {
        const c = text[i];
        if (quote) {
            if (c === '\\') i++;
            else if (c === quote) quote = null;
        } else if (c === '"' || c === "'") {
            quote = c;
        } else if (c === '{') {
            depth += 1;
        } else if (c === '}') {
            depth -= 1;
            if (depth === 0) return text.slice(start, i + 1);
        }
    }
    return null;
}

/** Object literals assigned in an inline script (`window.x = {...}`, `const x = {...}`). */
function assignedObjects(text: string): string[] {
    const found: string[] = [];
    for (const m of text.matchAll(ASSIGNMENT_HEAD_RE)) {
        const literal = objectLiteralAt(text, (m.index ?? 0) + m[0].length);
        if (literal) found.push(literal);
    }
    return found;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

function tagName(item: unknown): string | null {
    if (typeof item === 'string') return item;
    if (!isRecord(item)) return null;
    for (const key of ['hashtagName', 'title', 'name', 'tag']) {
        const v = item[key];
        if (typeof v === 'string' && v.trim()) return v;
    }
    return null;
}

function tagsOf(node: Record<string, unknown>): string[] {
    const tags: string[] = [];
    for (const key of ['hashtags', 'challenges', 'textExtra']) {
        const list = node[key];
        if (!Array.isArray(list)) continue;
        for (const item of list) {
            const name = tagName(item);
            if (name) tags.push(name);
        }
    }
    const keywords = node.keywords;
    if (typeof keywords === 'string') tags.push(...keywords.split(',').map((k) => k.trim()));
    return mergeHashtags(tags);
}

function idOf(node: Record<string, unknown>): string | null {
    for (const key of ID_KEYS) {
        const v = node[key];
        if ((typeof v === 'string' || typeof v === 'number') && /^\d{6,}$/.test(String(v))) return String(v);
    }
    return null;
}

/**
 * Video id → hashtags, collected from JSON script tags and `window.x = {...}` assignments.
 * Tags found outside any identified video object are stored under the empty key.
 */
export function embeddedHashtags($: CheerioAPI): Map<string, string[]> {
    const out = new Map<string, string[]>();
    const walk = (node: unknown, currentId: string, depth: number): void => {
        if (depth > 40) return;
        if (Array.isArray(node)) {
            for (const child of node) walk(child, currentId, depth + 1);
            return;
        }
        if (!isRecord(node)) return;
        const id = idOf(node) ?? currentId;
        const tags = tagsOf(node);
        if (tags.length) out.set(id, mergeHashtags(out.get(id) ?? [], tags));
        for (const value of Object.values(node)) {
            if (typeof value === 'object' && value !== null) walk(value, id, depth + 1);
        }
    };

    for (const el of $('script').toArray()) {
        const script = $(el);
        if (script.attr('src')) continue;
        const text = script.html() ?? '';
        const type = (script.attr('type') ?? '').toLowerCase();
        if (type.includes('json') || script.attr('id') === '__NEXT_DATA__') {
            walk(parseJson(text), '', 0);
            continue;
        }
        for (const literal of assignedObjects(text)) walk(parseJson(literal), '', 0);
    }
    return out;
}
