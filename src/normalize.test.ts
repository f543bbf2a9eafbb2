import { describe, expect, it } from 'vitest';
import {
    absoluteUrl,
    canonicalUrl,
    extractVideoId,
    hashtagsFromText,
    isTruncated,
    isWithinRange,
    mergeHashtags,
    normalizeEntry,
    parseCount,
    parseDateBound,
    parseRelativeTime,
} from './normalize.js';
import { URLEBIRD } from './sites.js';
import type { RawVideoEntry } from './types.js';

const SCRAPE_TIME = new Date('2023-06-10T12:00:00Z');

describe('parseCount', () => {
    it('expands abbreviated counts', () => {
        expect(parseCount('1.2M')).toBe(1_200_000);
        expect(parseCount('950K')).toBe(950_000);
        expect(parseCount('3B')).toBe(3_000_000_000);
        expect(parseCount('4.1k')).toBe(4_100);
    });

    it('reads plain numbers with separators and trailing words', () => {
        expect(parseCount('1,234')).toBe(1234);
        expect(parseCount('12')).toBe(12);
        expect(parseCount('2.5M views')).toBe(2_500_000);
    });

    it('returns null instead of zero for unreadable text', () => {
        expect(parseCount('n/a')).toBeNull();
        expect(parseCount('')).toBeNull();
        expect(parseCount(undefined)).toBeNull();
        expect(parseCount('1.2X')).toBeNull();
    });
});

describe('parseRelativeTime', () => {
    it('subtracts n units from the scrape time', () => {
        expect(parseRelativeTime('3 days ago', SCRAPE_TIME)?.toISOString()).toBe('2023-06-07T12:00:00.000Z');
        expect(parseRelativeTime('2 hours ago', SCRAPE_TIME)?.toISOString()).toBe('2023-06-10T10:00:00.000Z');
        expect(parseRelativeTime('1 week ago', SCRAPE_TIME)?.toISOString()).toBe('2023-06-03T12:00:00.000Z');
    });

    it('uses 30-day months and 365-day years', () => {
        expect(parseRelativeTime('2 months ago', SCRAPE_TIME)?.toISOString()).toBe('2023-04-11T12:00:00.000Z');
        expect(parseRelativeTime('1 year ago', SCRAPE_TIME)?.toISOString()).toBe('2022-06-10T12:00:00.000Z');
    });

    it('reads "a"/"an" as one and "just now" as the scrape time', () => {
        expect(parseRelativeTime('an hour ago', SCRAPE_TIME)?.toISOString()).toBe('2023-06-10T11:00:00.000Z');
        expect(parseRelativeTime('a day ago', SCRAPE_TIME)?.toISOString()).toBe('2023-06-09T12:00:00.000Z');
        expect(parseRelativeTime('Just now', SCRAPE_TIME)?.toISOString()).toBe('2023-06-10T12:00:00.000Z');
    });

    it('accepts absolute dates as UTC', () => {
        expect(parseRelativeTime('Jun 7, 2023', SCRAPE_TIME)?.toISOString()).toBe('2023-06-07T00:00:00.000Z');
        expect(parseRelativeTime('2023-06-07', SCRAPE_TIME)?.toISOString()).toBe('2023-06-07T00:00:00.000Z');
        expect(parseRelativeTime('2023-06-07T08:30:00Z', SCRAPE_TIME)?.toISOString()).toBe('2023-06-07T08:30:00.000Z');
    });

    it('returns null for anything else', () => {
        expect(parseRelativeTime('sometime', SCRAPE_TIME)).toBeNull();
        expect(parseRelativeTime('', SCRAPE_TIME)).toBeNull();
        expect(parseRelativeTime('Foo 7, 2023', SCRAPE_TIME)).toBeNull();
    });

    it('rejects calendar parts out of range instead of rolling over', () => {
        expect(parseRelativeTime('2023-13-45', SCRAPE_TIME)).toBeNull();
        expect(parseRelativeTime('2023-02-30', SCRAPE_TIME)).toBeNull();
        expect(parseRelativeTime('2023-06-07T24:10', SCRAPE_TIME)).toBeNull();
        expect(parseRelativeTime('2023-02-30T08:00:00Z', SCRAPE_TIME)).toBeNull();
        expect(parseRelativeTime('Feb 30, 2023', SCRAPE_TIME)).toBeNull();
        expect(parseRelativeTime('2024-02-29', SCRAPE_TIME)?.toISOString()).toBe('2024-02-29T00:00:00.000Z');
    });
});

describe('urls', () => {
    it('resolves against the site and drops query and fragment', () => {
        expect(canonicalUrl('/video/clip-7251234567890123456/?lang=en#top', URLEBIRD.baseUrl))
            .toBe('https://urlebird.com/video/clip-7251234567890123456/');
        expect(canonicalUrl('//urlebird.com/video/x-1/', URLEBIRD.baseUrl)).toBe('https://urlebird.com/video/x-1/');
    });

    it('rejects placeholders', () => {
        expect(canonicalUrl('#', URLEBIRD.baseUrl)).toBeNull();
        expect(canonicalUrl('javascript:void(0)', URLEBIRD.baseUrl)).toBeNull();
        expect(canonicalUrl('', URLEBIRD.baseUrl)).toBeNull();
    });

    it('keeps the query when resolving a link to follow', () => {
        expect(absoluteUrl('/hash/dance/?page=2#list', URLEBIRD.baseUrl)).toBe('https://urlebird.com/hash/dance/?page=2');
        expect(absoluteUrl('#', URLEBIRD.baseUrl)).toBeNull();
    });

    it('takes the trailing digits as video id', () => {
        expect(extractVideoId('https://urlebird.com/video/clip-7251234567890123456/')).toBe('7251234567890123456');
        expect(extractVideoId('https://urlebird.com/video/7251234567890123456')).toBe('7251234567890123456');
        expect(extractVideoId('https://urlebird.com/video/no-id/')).toBeNull();
    });
});

describe('hashtags', () => {
    it('collects tags in order without duplicates', () => {
        expect(hashtagsFromText('Hi #dance #FYP and #dance again #fyp')).toEqual(['dance', 'FYP']);
    });

    it('drops a tag cut off by truncation', () => {
        expect(hashtagsFromText('Moves #dance #fy...', ['...'])).toEqual(['dance']);
        expect(hashtagsFromText('Moves #dance #fyp ...', ['...'])).toEqual(['dance', 'fyp']);
    });

    it('detects truncation markers', () => {
        expect(isTruncated('story...', URLEBIRD.truncationMarkers)).toBe(true);
        expect(isTruncated('story…', URLEBIRD.truncationMarkers)).toBe(true);
        expect(isTruncated('story.', URLEBIRD.truncationMarkers)).toBe(false);
    });

    it('merges lists case-insensitively', () => {
        expect(mergeHashtags(['dance'], ['#Dance', 'ballet'])).toEqual(['dance', 'ballet']);
    });
});

describe('normalizeEntry', () => {
    const entry: RawVideoEntry = {
        url: '/video/clip-7251234567890123456/',
        videoIdHint: '',
        author: '@dancer_one',
        authorUrl: '/user/dancer_one/',
        description: 'Long text #dance #ballet and more...',
        timestampRaw: '3 days ago',
        viewsRaw: '1.2M',
        likesRaw: 'lots',
        commentsRaw: '',
        markupHashtags: ['stage'],
        rules: { url: 'overlay-link' },
    };
    const ctx = { site: URLEBIRD, scrapeTime: SCRAPE_TIME, query: 'dance' };

    it('keeps raw and derived values side by side', () => {
        const record = normalizeEntry(entry, ctx);
        expect(record).toMatchObject({
            url: 'https://urlebird.com/video/clip-7251234567890123456/',
            videoId: '7251234567890123456',
            timestampRaw: '3 days ago',
            estimatedReleaseTime: new Date('2023-06-07T12:00:00Z'),
            viewsRaw: '1.2M',
            views: 1_200_000,
            likesRaw: 'lots',
            likes: null,
            commentsRaw: '',
            comments: null,
            authorUrl: 'https://urlebird.com/user/dancer_one/',
            hashtags: ['dance', 'ballet', 'stage'],
            hashtagSource: 'description',
            needsEnrichment: true,
            tiktokUrl: 'https://www.tiktok.com/@dancer_one/video/7251234567890123456',
            query: 'dance',
        });
    });

    it('falls back to the page video id and discards entries without url', () => {
        const noIdInUrl = normalizeEntry({ ...entry, url: '/video/untitled/', videoIdHint: '998877665544' }, ctx);
        expect(noIdInUrl?.videoId).toBe('998877665544');
        expect(normalizeEntry({ ...entry, url: '' }, ctx)).toBeNull();
    });
});

describe('date range', () => {
    const range = {
        start: parseDateBound('2023-06-01', 'start'),
        end: parseDateBound('2023-06-07', 'end'),
    };

    it('includes both bounds', () => {
        expect(isWithinRange(new Date('2023-06-01T00:00:00Z'), range)).toBe(true);
        expect(isWithinRange(new Date('2023-06-07T23:59:59.999Z'), range)).toBe(true);
    });

    it('excludes dates outside', () => {
        expect(isWithinRange(new Date('2023-05-31T23:59:59.999Z'), range)).toBe(false);
        expect(isWithinRange(new Date('2023-06-08T00:00:00Z'), range)).toBe(false);
    });

    it('lets undated records through', () => {
        expect(isWithinRange(null, range)).toBe(true);
    });

    it('keeps full timestamps as given', () => {
        expect(parseDateBound('2023-06-07T12:00:00Z', 'end')?.toISOString()).toBe('2023-06-07T12:00:00.000Z');
        expect(parseDateBound('not a date', 'start')).toBeNull();
    });

    it('rejects a bound that is not a calendar day', () => {
        expect(parseDateBound('2023-13-45', 'start')).toBeNull();
        expect(parseDateBound('2023-04-31', 'end')).toBeNull();
    });
});
