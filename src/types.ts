// ===[ Record types ]========================================================

/** Fields the extractor looks up with selector strategies. */
export const ENTRY_FIELDS = [
    'url',
    'videoId',
    'author',
    'authorUrl',
    'description',
    'timestamp',
    'views',
    'likes',
    'comments',
] as const;

export type EntryField = (typeof ENTRY_FIELDS)[number];

export type HashtagSource = 'description' | 'markup' | 'embedded-json' | 'none';

/** What one entry container yields before any normalization. Empty string = not found. */
export type RawVideoEntry = {
    url: string;
    videoIdHint: string;
    author: string;
    authorUrl: string;
    description: string;
    timestampRaw: string;
    viewsRaw: string;
    likesRaw: string;
    commentsRaw: string;
    markupHashtags: string[];
    /** Rule name that produced each field. */
    rules: Partial<Record<EntryField, string>>;
};

/**
 * Normalized video. Derived values are `null` when their raw text could not be parsed,
 * never a silent zero.
 */
export type VideoRecord = {
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
    hashtagSource: HashtagSource;
    needsEnrichment: boolean;
    tiktokUrl: string | null;
    /** Hashtag query that first produced the record. */
    query: string;
    rules: Partial<Record<EntryField, string>>;
};
