import { readFileSync } from 'node:fs';
import type { VideoRecord } from '../types.js';

/** Reads one of the HTML files next to this module. */
export function fixture(name: string): string {
    return readFileSync(new URL(`./${name}`, import.meta.url), 'utf-8');
}

export type ThumbOptions = {
    id: number | string;
    author?: string;
    description?: string;
    time?: string;
    views?: string;
};

export function videoUrl(id: number | string): string {
    return `https://urlebird.com/video/clip-${id}/`;
}

/** One listing entry in the site's markup. */
export function thumb(o: ThumbOptions): string {
    const href = `/video/clip-${o.id}/`;
    const author = o.author ?? 'someone';
    return `
    <div class="thumb">
        <a class="overlay-s" href="${href}"></a>
        <div class="info3">
            <div class="author-name"><a href="/user/${author}/">@${author}</a></div>
            <a href="${href}"><span>${o.description ?? `clip ${o.id}`}</span></a>
        </div>
        <div class="stats">
            <div><i class="fa fa-clock"></i> ${o.time ?? '1 day ago'}</div>
            <div><i class="fa fa-play"></i> ${o.views ?? '100'}</div>
        </div>
    </div>`;
}

export function thumbs(ids: Array<number | string>): string {
    return ids.map((id) => thumb({ id })).join('\n');
}

/** Hashtag document; pass `withControl: false` for a page without a load-more button. */
export function hashPage(body: string, withControl = true, hash = 'dance'): string {
    const control = withControl
        ? `<div id="paging"><a id="hash_load_more" class="btn" href="#" data-hash="${hash}" data-id="77" data-page="2" data-cursor="20">Load more</a></div>`
        : '';
    return `<!DOCTYPE html><html><body><div id="thumbs">${body}</div>${control}</body></html>`;
}

/** A normalized record with plausible defaults. */
export function makeRecord(overrides: Partial<VideoRecord> = {}): VideoRecord {
    return {
        url: videoUrl(1),
        videoId: '1',
        scrapeTime: new Date('2023-06-10T12:00:00Z'),
        timestampRaw: '1 day ago',
        estimatedReleaseTime: new Date('2023-06-09T12:00:00Z'),
        viewsRaw: '100',
        likesRaw: '',
        commentsRaw: '',
        views: 100,
        likes: null,
        comments: null,
        author: '@someone',
        authorUrl: 'https://urlebird.com/user/someone/',
        descriptionAndHashtags: 'clip 1',
        hashtags: [],
        hashtagSource: 'none',
        needsEnrichment: false,
        tiktokUrl: 'https://www.tiktok.com/@someone/video/1',
        query: 'dance',
        rules: {},
        ...overrides,
    };
}
