import { z } from 'zod';
import { parseDateBound } from './normalize.js';

/**
 * ---------------------------------------------------------------------------
 * Configuration
 *
 *  - Environment (.env via dotenv, loaded in main.ts) supplies defaults for the politeness
 *    knobs, browser and storage settings.
 *  - CLI flags (`--key value` / `--flag`) override them per run.
 *  - Both pass through zod; a bad value stops the run before any request is made.
 * ---------------------------------------------------------------------------
 */

const numberFrom = (fallback: string) => z.string().default(fallback).transform((v) => Number(v));

const envSchema = z.object({
    LOG_LEVEL: z.string().default('INFO').transform((v) => v.toUpperCase()),
    HEADFUL: z.enum(['0', '1']).default('0').transform((v) => v === '1'),
    SCRAPER_BROWSER: z.enum(['firefox', 'chromium']).default('firefox'),
    SCRAPER_DELAY_SECONDS: numberFrom('2').pipe(z.number().min(0)),
    SCRAPER_TIMEOUT_SECONDS: numberFrom('30').pipe(z.number().positive()),
    SCRAPER_MAX_ATTEMPTS: numberFrom('3').pipe(z.number().int().min(1).max(10)),
    SCRAPER_RETRY_BASE_DELAY_MS: numberFrom('1000').pipe(z.number().int().positive()),
    SCRAPER_RETRY_MAX_DELAY_MS: numberFrom('30000').pipe(z.number().int().positive()),
    SCRAPER_PROXY_URLS: z.string().default(''),
    SCRAPER_OUTPUT_DIR: z.string().min(1).default('output'),
    SCRAPER_DEBUG_STORE: z.string().min(1).default('debug-pages'),
});

export type EnvConfig = z.infer<typeof envSchema>;

// ===[ CLI parser ]==========================================================
export type ParsedArgs = {
    options: Record<string, string | true>;
    positionals: string[];
};

/** `--key value` pairs, bare `--flag`s and positional arguments, in the order given. */
export function parseArgs(args: readonly string[]): ParsedArgs {
    const options: Record<string, string | true> = {};
    const positionals: string[] = [];

    let i = 0;
    while (i < args.length) {
        const arg = args[i];
        if (arg.startsWith('--')) {
            const eq = arg.indexOf('=');
            if (eq > 2) {
                options[arg.substring(2, eq)] = arg.substring(eq + 1);
            } else {
                const key = arg.substring(2);
                const nextArg = args[i + 1];
                if (nextArg !== undefined && !nextArg.startsWith('--')) {
                    options[key] = nextArg;
                    i++;
                } else {
                    options[key] = true;
                }
            }
        } else {
            positionals.push(arg);
        }
        i++;
    }
    return { options, positionals };
}

// ===[ Run configuration ]===================================================
const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);
const flag = z.union([z.literal(true), z.enum(['true', 'false', '1', '0'])])
    .transform((v) => v === true || v === 'true' || v === '1');
const dateBound = (edge: 'start' | 'end') => z.string().transform((value, ctx) => {
    const date = parseDateBound(value, edge);
    if (!date) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a date: ${value}` });
        return z.NEVER;
    }
    return date;
});

const cliSchema = z.object({
    hashtag: z.string().optional(),
    'start-date': dateBound('start').optional(),
    'end-date': dateBound('end').optional(),
    'max-pages': positiveInt.default(5),
    'max-loads': nonNegativeInt.optional(),
    delay: z.coerce.number().min(0).optional(),
    timeout: z.coerce.number().positive().optional(),
    'max-retries': z.coerce.number().int().min(1).max(10).optional(),
    proxy: z.string().optional(),
    'batch-size': positiveInt.default(5),
    'max-concurrent': positiveInt.default(3),
    'skip-enrichment': flag.default('false'),
    'two-stage': flag.default('false'),
    concurrent: flag.default('false'),
    'max-workers': positiveInt.default(3),
    fetcher: z.enum(['http', 'browser']).default('http'),
    browser: z.enum(['firefox', 'chromium']).optional(),
    format: z.enum(['csv', 'json']).default('csv'),
    output: z.string().min(1).optional(),
    'save-stats': flag.default('false'),
    'incremental-save': flag.default('false'),
    'checkpoint-every': nonNegativeInt.optional(),
    'enrich-from': z.string().min(1).optional(),
});

export type RunConfig = {
    hashtags: string[];
    startDate: Date | null;
    endDate: Date | null;
    maxLoads: number;
    delayMs: number;
    timeoutMs: number;
    maxAttempts: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
    proxyUrls: string[];
    batchSize: number;
    maxConcurrency: number;
    enrich: boolean;
    twoStage: boolean;
    concurrent: boolean;
    maxWorkers: number;
    fetcher: 'http' | 'browser';
    browser: 'firefox' | 'chromium';
    headless: boolean;
    format: 'csv' | 'json';
    output: string | null;
    outputDir: string;
    saveStats: boolean;
    checkpointEvery: number;
    debugStore: string;
    logLevel: string;
    /** Saved record file to enrich instead of scraping. */
    enrichFrom: string | null;
};

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`invalid configuration:\n  ${issues.join('\n  ')}`);
        this.name = 'ConfigError';
    }
}

const splitList = (value: string | undefined): string[] =>
    (value ?? '').split(',').map((v) => v.trim()).filter(Boolean);

export function resolveConfig(args: readonly string[], env: NodeJS.ProcessEnv = process.env): RunConfig {
    const envResult = envSchema.safeParse(env);
    const { options, positionals } = parseArgs(args);
    const cliResult = cliSchema.safeParse(options);

    const issues: string[] = [];
    if (!envResult.success) issues.push(...envResult.error.issues.map((i) => `env ${i.path.join('.')}: ${i.message}`));
    if (!cliResult.success) issues.push(...cliResult.error.issues.map((i) => `--${i.path.join('.')}: ${i.message}`));
    if (!envResult.success || !cliResult.success) throw new ConfigError(issues);

    const e = envResult.data;
    const o = cliResult.data;
    const hashtags = [...splitList(o.hashtag), ...positionals.flatMap((p) => splitList(p))]
        .map((t) => t.replace(/^#/, ''))
        .filter((t, idx, all) => t && all.indexOf(t) === idx);
    const enrichFrom = o['enrich-from'] ?? null;
    if (!hashtags.length && !enrichFrom) {
        throw new ConfigError(['--hashtag: at least one hashtag is required (or --enrich-from <file>)']);
    }

    const startDate = o['start-date'] ?? null;
    const endDate = o['end-date'] ?? null;
    if (startDate && endDate && startDate.getTime() > endDate.getTime()) {
        throw new ConfigError(['--start-date: must not be after --end-date']);
    }

    return {
        hashtags,
        startDate,
        endDate,
        // the hashtag page itself is the first of --max-pages
        maxLoads: o['max-loads'] ?? o['max-pages'] - 1,
        delayMs: Math.round((o.delay ?? e.SCRAPER_DELAY_SECONDS) * 1000),
        timeoutMs: Math.round((o.timeout ?? e.SCRAPER_TIMEOUT_SECONDS) * 1000),
        maxAttempts: o['max-retries'] ?? e.SCRAPER_MAX_ATTEMPTS,
        retryBaseDelayMs: e.SCRAPER_RETRY_BASE_DELAY_MS,
        retryMaxDelayMs: e.SCRAPER_RETRY_MAX_DELAY_MS,
        proxyUrls: o.proxy !== undefined ? splitList(o.proxy) : splitList(e.SCRAPER_PROXY_URLS),
        batchSize: o['batch-size'],
        maxConcurrency: o['max-concurrent'],
        enrich: !o['skip-enrichment'],
        twoStage: o['two-stage'],
        concurrent: o.concurrent,
        maxWorkers: o['max-workers'],
        fetcher: o.fetcher,
        browser: o.browser ?? e.SCRAPER_BROWSER,
        headless: !e.HEADFUL,
        format: o.format,
        output: o.output ?? null,
        outputDir: e.SCRAPER_OUTPUT_DIR,
        saveStats: o['save-stats'],
        checkpointEvery: o['checkpoint-every'] ?? (o['incremental-save'] ? 1 : 0),
        debugStore: e.SCRAPER_DEBUG_STORE,
        logLevel: e.LOG_LEVEL,
        enrichFrom,
    };
}
