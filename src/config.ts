/**
 * Harness configuration schema with validation
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';
import { QUERIES, type Query } from './fixtures/oracle.js';

export type HarnessMode = 'functional' | 'timed';

/** Full-HD grid used for timing runs. */
export const TIMED_DEFAULT_SIZE = { width: 1920, height: 1080 } as const;
export const FUNCTIONAL_DEFAULT_SIZE = { width: 64, height: 64 } as const;

const QueryEnum = z.enum(['test', 'hline', 'vline', 'square']);
const LogLevelEnum = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const HarnessConfigSchema = z.object({
    /** Path (or PATH-resolvable name) of the program under test. */
    exec: z.string().min(1, 'path to the program under test is required'),

    /** Arguments placed before `<query> <bitmap>`, e.g. a script for an interpreter. */
    execArgs: z.array(z.string()).default([]),

    /**
     * functional: classify output; timed: measure wall-clock only
     * @default 'functional'
     */
    mode: z.enum(['functional', 'timed']).default('functional'),

    /** `test` query coin-flips between valid and corrupted fixtures. */
    randomValidity: z.boolean().default(false),

    /** Resample separators and line ends as random whitespace runs. */
    fuzzWhitespace: z.boolean().default(false),

    /** Print every trial record in the summary. */
    verbose: z.boolean().default(false),

    /** Ask the operator on uncertain matches and pause after failures. */
    interactive: z.boolean().default(false),

    /** Mulberry32 state is 32 bits; larger seeds would alias smaller ones. */
    seed: z.number().int().nonnegative().max(0xffffffff).optional(),

    /**
     * Trials per query
     * @default 10
     */
    trials: z.number().int().positive().default(10),

    width: z.number().int().positive().optional(),
    height: z.number().int().positive().optional(),

    queries: z.array(QueryEnum).min(1).optional(),

    /**
     * Scratch directory, emptied at run start
     * @default 'scratch'
     */
    scratchDir: z.string().min(1).default('scratch'),

    /**
     * Kill the program after this many ms; 0 disables the timeout
     * @default 0
     */
    timeoutMs: z.number().int().nonnegative().default(0),

    logLevel: LogLevelEnum.optional(),
});

export type HarnessConfigInput = z.input<typeof HarnessConfigSchema>;

export interface HarnessConfig {
    exec: string;
    execArgs: string[];
    mode: HarnessMode;
    randomValidity: boolean;
    fuzzWhitespace: boolean;
    verbose: boolean;
    interactive: boolean;
    seed: number;
    trials: number;
    width: number;
    height: number;
    queries: Query[];
    scratchDir: string;
    timeoutMs: number;
    logLevel?: LogLevel;
}

function envInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value)) {
        throw new ConfigError(`Invalid ${key}`, [`expected an integer, got "${raw}"`]);
    }
    return value;
}

function envLogLevel(env: NodeJS.ProcessEnv): LogLevel | undefined {
    const raw = env.BITMAP_ORACLE_LOG_LEVEL;
    return LOG_LEVELS.find(level => level === raw);
}

/**
 * Validates `input` and fills mode-dependent defaults. Explicit input wins
 * over `BITMAP_ORACLE_*` environment variables.
 */
export function loadConfig(input: Partial<HarnessConfigInput>, env: NodeJS.ProcessEnv = process.env): HarnessConfig {
    const merged = {
        seed: envInt(env, 'BITMAP_ORACLE_SEED'),
        trials: envInt(env, 'BITMAP_ORACLE_TRIALS'),
        scratchDir: env.BITMAP_ORACLE_SCRATCH || undefined,
        logLevel: envLogLevel(env),
        ...Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined)),
    };

    const parsed = HarnessConfigSchema.safeParse(merged);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new ConfigError('Invalid harness configuration', issues);
    }

    const cfg = parsed.data;
    const timed = cfg.mode === 'timed';
    const defaultSize = timed ? TIMED_DEFAULT_SIZE : FUNCTIONAL_DEFAULT_SIZE;

    return {
        exec: cfg.exec,
        execArgs: cfg.execArgs,
        mode: cfg.mode,
        randomValidity: cfg.randomValidity,
        fuzzWhitespace: cfg.fuzzWhitespace,
        verbose: cfg.verbose,
        interactive: cfg.interactive,
        seed: cfg.seed ?? (Date.now() & 0x7fffffff),
        trials: cfg.trials,
        width: cfg.width ?? defaultSize.width,
        height: cfg.height ?? defaultSize.height,
        queries: cfg.queries ?? (timed ? ['test'] : [...QUERIES]),
        scratchDir: cfg.scratchDir,
        timeoutMs: cfg.timeoutMs,
        logLevel: cfg.logLevel,
    };
}
