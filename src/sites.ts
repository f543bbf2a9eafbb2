import type { EntryField } from './types.js';
import {
    attrOf,
    cleanText,
    firstOutside,
    iconText,
    rule,
    textOf,
    type SelectorStrategy,
} from './selectors.js';

/**
 * ---------------------------------------------------------------------------
 * Site registry
 *
 * Everything that depends on the aggregator's markup lives here: entry containers, per-field
 * selector strategies, the load-more control and its AJAX endpoint, and the video-page
 * description selectors used by enrichment. When the site changes its templates, this is the
 * only file that should need edits: add a rule to the front of the relevant list and keep the
 * old ones as fallbacks.
 * ---------------------------------------------------------------------------
 */

export type SiteConfig = {
    readonly SITE_NAME: string;
    readonly baseUrl: string;
    readonly hashtagUrl: (tag: string) => string;
    /** Canonical video page on TikTok itself. */
    readonly tiktokVideoUrl: (author: string, videoId: string) => string;
    readonly entry: {
        /** Tried in order; the first that matches anything is used. */
        readonly containers: readonly string[];
        /** Ad placeholders rendered with the same container class. */
        readonly exclude: string;
    };
    readonly fields: Readonly<Record<EntryField, SelectorStrategy>>;
    readonly hashtagLinks: string;
    readonly loadMore: {
        readonly endpoint: string;
        readonly controls: readonly string[];
        /** data-* attributes forwarded as form fields, with defaults for the missing ones. */
        readonly params: Readonly<Record<string, string | null>>;
        /** Continuation values that sometimes only exist in inline scripts. */
        readonly scriptTokens: Readonly<Record<string, RegExp>>;
    };
    readonly detail: {
        readonly description: SelectorStrategy;
        readonly hashtagLinks: string;
    };
    readonly truncationMarkers: readonly string[];
};

const URLEBIRD_BASE = 'https://urlebird.com';

const videoLinkOutsideAuthor = rule('info3-video-link', (scope, $) => {
    const link = firstOutside(scope, $, '.info3 a[href*="/video/"]', '.author-name');
    return link?.attr('href') ?? null;
});

const info3Description = rule('info3-span', (scope, $) => {
    for (const el of scope.find('.info3 a').toArray()) {
        const link = $(el);
        if (link.closest('.author-name').length) continue;
        if ((link.attr('href') ?? '').includes('/user/')) continue;
        const text = cleanText(link.find('span').first().text()) || cleanText(link.text());
        if (text) return text;
    }
    return null;
});

export const URLEBIRD: SiteConfig = Object.freeze({
    SITE_NAME: 'urlebird',
    baseUrl: URLEBIRD_BASE,
    hashtagUrl: (tag: string) => `${URLEBIRD_BASE}/hash/${encodeURIComponent(tag.replace(/^#/, ''))}/`,
    tiktokVideoUrl: (author: string, videoId: string) =>
        `https://www.tiktok.com/@${author.replace(/^@/, '')}/video/${videoId}`,
    entry: {
        containers: ['#thumbs div.thumb', 'div.thumb', '.video-item', 'article.video'],
        exclude: '.display-flex-semi',
    },
    fields: {
        url: [
            attrOf('overlay-link', 'a.overlay-s[href*="/video/"]', 'href'),
            attrOf('overlay-wrapper', 'a[href*="/video/"]:has(.overlay-s)', 'href'),
            videoLinkOutsideAuthor,
            attrOf('any-video-link', 'a[href*="/video/"]', 'href'),
            attrOf('data-video-url', '', 'data-video-url'),
        ],
        videoId: [
            attrOf('data-video-id', '', 'data-video-id'),
            attrOf('nested-data-video-id', '[data-video-id]', 'data-video-id'),
        ],
        author: [
            textOf('author-name', '.author-name a'),
            textOf('user-link', 'a[href*="/user/"]'),
            textOf('username', '.username'),
            textOf('creator-name', '.creator-name'),
        ],
        authorUrl: [
            attrOf('author-name-href', '.author-name a', 'href'),
            attrOf('user-link-href', 'a[href*="/user/"]', 'href'),
        ],
        description: [
            info3Description,
            textOf('info2-h1', '.info2 h1'),
            textOf('video-description', '.video-description'),
            textOf('caption', '.caption'),
            attrOf('thumb-img-alt', 'img[alt]', 'alt'),
        ],
        timestamp: [
            iconText('stats-clock', '.stats .fa-clock'),
            iconText('clock-icon', '.fa-clock'),
            textOf('time-tag', 'time'),
            textOf('date-class', '.date'),
        ],
        views: [
            iconText('stats-play', '.stats .fa-play'),
            iconText('play-icon', '.fa-play'),
            attrOf('data-views', '[data-views]', 'data-views'),
        ],
        likes: [
            iconText('stats-heart', '.stats .fa-heart'),
            iconText('heart-icon', '.fa-heart'),
            attrOf('data-likes', '[data-likes]', 'data-likes'),
        ],
        comments: [
            iconText('stats-comment', '.stats .fa-comment'),
            iconText('comment-icon', '.fa-comment'),
            attrOf('data-comments', '[data-comments]', 'data-comments'),
        ],
    },
    hashtagLinks: 'a[href*="/hash/"]',
    loadMore: {
        endpoint: `${URLEBIRD_BASE}/hash_load_more`,
        controls: [
            '#hash_load_more',
            '#paging a.btn',
            'a.load-more-btn',
            'a.js-load-more',
            'button.load-more',
            '.load-more-container a',
            '.pagination a.next',
            '.more-videos-btn',
            '.show-more-btn',
            '#load-more',
            '.load-more',
            'button[data-load-more]',
            '[data-action="load-more"]',
        ],
        params: { hash: null, id: null, page: '2', cursor: '20', x: null },
        scriptTokens: {
            cursor: /\b(?:hash_?cursor|next_?cursor|cursor)\s*[:=]\s*["']?([\w-]+)/i,
            page: /\b(?:hash_?page|next_?page)\s*[:=]\s*["']?(\d+)/i,
            x: /\bhash_?x\s*[:=]\s*["']?([\w-]+)/i,
        },
    },
    detail: {
        description: [
            textOf('info2-h1', '.info2 h1'),
            textOf('video-description-h1', '.video-description h1'),
            textOf('video-info-h1', '.video-info h1'),
            textOf('content-h1', '.content h1'),
            textOf('h1-description', 'h1.description'),
            textOf('info-h1', '.info h1'),
            textOf('description', '.description'),
            textOf('video-text', '.video-text'),
            textOf('caption', '.caption'),
        ],
        hashtagLinks: '.info2 a[href*="/hash/"], .video-description a[href*="/hash/"]',
    },
    truncationMarkers: ['...', '…'],
});

export const SITES: Readonly<Record<string, SiteConfig>> = Object.freeze({
    urlebird: URLEBIRD,
});
