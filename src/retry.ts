import { FetchError, HttpError, isRetryable } from './errors.js';

export interface RetryOptions {
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly maxDelayMs?: number;
    /** Defaults to the crawler's taxonomy: network failures, 5xx and 429. */
    readonly shouldRetry?: (error: unknown) => boolean;
    readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
    readonly sleep?: (ms: number) => Promise<void>;
    readonly random?: () => number;
}

export const sleep = async (ms: number): Promise<void> => {
    await new Promise((resolve) => setTimeout(resolve, ms));
};

/** ±20% spread around `ms`. */
export const jitter = (ms: number, random: () => number = Math.random): number => {
    const spread = Math.floor(ms * 0.2);
    return ms + Math.floor((random() * 2 - 1) * spread);
};

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
    return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Runs `fn` until it resolves or the attempts are used up. The error that escapes is the last
 * one thrown; fetch errors carry the number of attempts that were made.
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions,
): Promise<T> {
    const maxDelayMs = options.maxDelayMs ?? 30_000;
    const shouldRetry = options.shouldRetry ?? isRetryable;
    const wait = options.sleep ?? sleep;
    const maxAttempts = Math.max(1, options.maxAttempts);

    for (let attempt = 1; ; attempt += 1) {
        try {
            return await fn(attempt);
        } catch (error) {
            if (error instanceof FetchError) error.attempts = attempt;
            if (!shouldRetry(error) || attempt >= maxAttempts) throw error;

            const retryAfterMs = error instanceof HttpError ? error.retryAfterMs : undefined;
            const delayMs = retryAfterMs && retryAfterMs > 0
                ? retryAfterMs
                : jitter(backoffDelay(attempt, options.baseDelayMs, maxDelayMs), options.random);
            options.onRetry?.(error, attempt, delayMs);
            await wait(delayMs);
        }
    }
}

/** Rejects with whatever `onTimeout` builds once `ms` elapse; the timer is cleared either way. */
export async function withTimeout<T>(
    promise: Promise<T>,
    ms: number,
    onTimeout: () => Error,
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(onTimeout()), ms);
    });
    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
