#!/usr/bin/env node
/**
 * CLI: Bitmap fixture harness
 *
 * Usage:  tsx tools/harness.ts --exec <path> [--mode functional|timed]
 *             [--random] [--whitespace] [--verbose] [--interactive]
 *             [--seed N] [--trials N] [--width N] [--height N]
 *             [--queries test,hline,vline,square] [--scratch DIR]
 *             [--timeout MS] [--conformance] [--exec-arg ARG]...
 *
 * Generates fixtures, runs the program under test on each and judges its
 * output. Exit code: 0 all passed, 1 some trials failed, 2 fatal error.
 */

import {
    HarnessError,
    PreconditionViolationError,
    checkConformance,
    createConsoleResolver,
    createLogger,
    isQuery,
    loadConfig,
    runFunctional,
    runTimed,
    type HarnessConfigInput,
    type Query,
} from '../src/index.js';

// --- CLI args ---
const args = process.argv.slice(2);

function getArg(name: string): string | undefined {
    const idx = args.indexOf(`--${name}`);
    return idx !== -1 && args[idx + 1] !== undefined ? args[idx + 1] : undefined;
}

function allArgs(name: string): string[] {
    const values: string[] = [];
    args.forEach((a, i) => {
        if (a === `--${name}` && args[i + 1] !== undefined) values.push(args[i + 1]);
    });
    return values;
}

function hasFlag(name: string): boolean {
    return args.includes(`--${name}`);
}

function intArg(name: string): number | undefined {
    const raw = getArg(name);
    return raw === undefined ? undefined : Number(raw);
}

function queriesArg(): Query[] | undefined {
    const raw = getArg('queries');
    if (raw === undefined) return undefined;
    const names = raw.split(',').map(q => q.trim()).filter(q => q !== '');
    const unknown = names.filter(q => !isQuery(q));
    if (unknown.length > 0) {
        throw new PreconditionViolationError(`Unknown queries: ${unknown.join(', ')}`);
    }
    return names.filter(isQuery);
}

function parseMode(): HarnessConfigInput['mode'] {
    const raw = getArg('mode');
    if (raw === undefined) return undefined;
    if (raw === 'functional' || raw === 'timed') return raw;
    // legacy spellings
    if (raw === 'time') return 'timed';
    if (raw === 'functionality') return 'functional';
    throw new PreconditionViolationError(`Unknown mode "${raw}"; expected functional or timed`);
}

async function main(): Promise<number> {
    const config = loadConfig({
        exec: getArg('exec') ?? '',
        execArgs: allArgs('exec-arg'),
        mode: parseMode(),
        randomValidity: hasFlag('random'),
        fuzzWhitespace: hasFlag('whitespace'),
        verbose: hasFlag('verbose'),
        interactive: hasFlag('interactive'),
        seed: intArg('seed'),
        trials: intArg('trials'),
        width: intArg('width'),
        height: intArg('height'),
        queries: queriesArg(),
        scratchDir: getArg('scratch'),
        timeoutMs: intArg('timeout'),
    });
    const logger = createLogger({ module: 'harness' }, { level: config.logLevel });

    if (hasFlag('conformance')) {
        const results = await checkConformance(config, { logger });
        return results.every(r => r.verdict === 'pass') ? 0 : 1;
    }

    if (config.mode === 'timed') {
        await runTimed(config, { logger });
        return 0;
    }

    const resolver = config.interactive ? createConsoleResolver() : undefined;
    try {
        const summary = await runFunctional(config, { logger, resolver });
        return summary.failed === 0 ? 0 : 1;
    } finally {
        resolver?.close?.();
    }
}

main().then(
    code => process.exit(code),
    (err: unknown) => {
        if (err instanceof HarnessError) {
            console.error(`${err.name}: ${err.message}`);
        } else {
            console.error(err);
        }
        process.exit(2);
    }
);
