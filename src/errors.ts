/**
 * Error taxonomy shared by every stage of the crawler.
 *
 *  • NetworkError : connection failure or timeout (retryable)
 *  • HttpError    : non-2xx status (retryable for 5xx/429, final otherwise)
 *  • ParseError   : a document did not have the shape we expected (never fatal)
 *
 * Running out of pages is not an error; see PaginationStatus in pagination.ts.
 */

export class ScrapeError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Common base of the two fetch failures; `attempts` is filled in when retries give up. */
export abstract class FetchError extends ScrapeError {
    attempts = 1;

    constructor(message: string, readonly url: string, options?: { cause?: unknown }) {
        super(message, options);
    }

    /** Last HTTP status seen, if the server answered at all. */
    abstract get lastStatus(): number | null;
}

export class NetworkError extends FetchError {
    get lastStatus(): number | null {
        return null;
    }
}

export class HttpError extends FetchError {
    constructor(
        readonly status: number,
        url: string,
        readonly retryAfterMs?: number,
    ) {
        super(`HTTP ${status} for ${url}`, url);
    }

    get lastStatus(): number | null {
        return this.status;
    }
}

export class ParseError extends ScrapeError {
    /** `body` is the document that could not be read, kept for debug artifacts. */
    constructor(message: string, readonly url?: string, readonly body?: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export function isRetryable(error: unknown): boolean {
    if (error instanceof NetworkError) return true;
    if (error instanceof HttpError) return error.status >= 500 || error.status === 429;
    return false;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
