import type { EnrichmentStats } from './enrichment.js';
import type { PaginationStatus } from './pagination.js';
import { ENTRY_FIELDS, type EntryField, type VideoRecord } from './types.js';

// ===[ Run statistics ]======================================================
export type QueryStats = {
    hashtag: string;
    url: string;
    documents: number;
    loads: number;
    recordsAdded: number;
    status: PaginationStatus;
};

export type ScrapeStats = {
    startedAt: string;
    finishedAt: string | null;
    queries: QueryStats[];
    recordsExtracted: number;
    duplicatesSkipped: number;
    discardedWithoutUrl: number;
    filteredByDate: number;
    /** URLs of records without a usable date; kept in the output for manual review. */
    undatedForReview: string[];
    enrichment: EnrichmentStats;
    /** field → rule name → records that got the field from that rule. */
    selectorHits: Partial<Record<EntryField, Record<string, number>>>;
};

export function countSelectorHits(records: readonly VideoRecord[]): ScrapeStats['selectorHits'] {
    const hits: ScrapeStats['selectorHits'] = {};
    for (const record of records) {
        for (const field of ENTRY_FIELDS) {
            const ruleName = record.rules[field];
            if (!ruleName) continue;
            const perRule = (hits[field] ??= {});
            perRule[ruleName] = (perRule[ruleName] ?? 0) + 1;
        }
    }
    return hits;
}

// ===[ Summary ]=============================================================
export type RankedCount = { name: string; count: number };

export type RecordSummary = {
    totalVideos: number;
    averageViews: number | null;
    maxViews: number | null;
    averageLikes: number | null;
    maxLikes: number | null;
    topAuthors: RankedCount[];
    /** Hashtags seen next to the queried ones, most frequent first. */
    relatedHashtags: RankedCount[];
};

function known(values: Array<number | null>): number[] {
    return values.filter((v): v is number => v !== null);
}

function average(values: number[]): number | null {
    return values.length ? Math.round(values.reduce((a, b) => a + b, 0) / values.length) : null;
}

function top(counts: Map<string, number>, n: number): RankedCount[] {
    return [...counts.entries()]
        .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
        .slice(0, n)
        .map(([name, count]) => ({ name, count }));
}

export function summarizeRecords(records: readonly VideoRecord[], queried: readonly string[], n = 10): RecordSummary {
    const views = known(records.map((r) => r.views));
    const likes = known(records.map((r) => r.likes));
    const authors = new Map<string, number>();
    const tags = new Map<string, number>();
    const exclude = new Set(queried.map((q) => q.replace(/^#/, '').toLowerCase()));

    for (const r of records) {
        if (r.author) authors.set(r.author, (authors.get(r.author) ?? 0) + 1);
        for (const tag of r.hashtags) {
            const t = tag.toLowerCase();
            if (!exclude.has(t)) tags.set(t, (tags.get(t) ?? 0) + 1);
        }
    }

    return {
        totalVideos: records.length,
        averageViews: average(views),
        maxViews: views.length ? Math.max(...views) : null,
        averageLikes: average(likes),
        maxLikes: likes.length ? Math.max(...likes) : null,
        topAuthors: top(authors, n),
        relatedHashtags: top(tags, n),
    };
}
