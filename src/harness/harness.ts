import * as fs from 'fs';
import * as path from 'path';
import type { HarnessConfig } from '../config.js';
import { PreconditionViolationError, ProcessFailureError } from '../errors.js';
import { writeBitmap } from '../fixtures/bitmap-writer.js';
import { generateFixture, type Fixture } from '../fixtures/factory.js';
import { Bitmap, hline, square, vline, type BitmapSize } from '../fixtures/geometry.js';
import { expectedOutput, type Oracle, type Query } from '../fixtures/oracle.js';
import { SeededRNG } from '../fixtures/rng.js';
import { silentLogger, type Logger } from '../logger.js';
import { compareOutput, type Verdict } from './comparator.js';
import { autoRejectResolver, type ReviewDecision, type ReviewResolver } from './review.js';
import { prepareScratchDir } from './scratch.js';
import { runProgram, type ProcessResult } from './spawn.js';
import { formatTiming, summarizeDurations, type TimingStats } from './stats.js';

export type ReportSink = (line: string) => void;

export interface HarnessDeps {
    logger?: Logger;
    resolver?: ReviewResolver;
    report?: ReportSink;
}

export interface TrialRecord {
    trial: number;
    query: Query;
    fixture: string;
    expected: string;
    actual: string;
    exitCode: number | null;
    durationMs: number;
    /** Final outcome after any operator review. */
    outcome: 'pass' | 'fail';
    /** Comparator verdict; `null` when the process failed before output was judged. */
    comparison: Verdict | null;
    review?: ReviewDecision;
    reason?: string;
}

export interface RunSummary {
    seed: number;
    records: TrialRecord[];
    passed: number;
    failed: number;
    processFailures: number;
    reviewedAccepted: number;
    reviewedRejected: number;
    timing: TimingStats;
}

interface Resolved {
    logger: Logger;
    resolver: ReviewResolver;
    report: ReportSink;
}

function resolveDeps(deps: HarnessDeps): Resolved {
    return {
        logger: deps.logger ?? silentLogger,
        resolver: deps.resolver ?? autoRejectResolver,
        report: deps.report ?? ((line: string) => console.log(line)),
    };
}

/**
 * Path-like `exec` values must name an existing regular file; bare names are
 * left to PATH lookup at spawn time.
 */
export function assertProgram(exec: string): void {
    if (!exec.includes('/') && !exec.includes(path.sep)) return;
    let stat: fs.Stats;
    try {
        stat = fs.statSync(exec);
    } catch (err) {
        throw new PreconditionViolationError(`Program under test not found: ${exec}`, err);
    }
    if (!stat.isFile()) {
        throw new PreconditionViolationError(`Program under test is not a regular file: ${exec}`);
    }
}

function invoke(config: HarnessConfig, query: Query, fixturePath: string): Promise<ProcessResult> {
    return runProgram(config.exec, [...config.execArgs, query, fixturePath], { timeoutMs: config.timeoutMs });
}

function sizeOf(config: HarnessConfig): BitmapSize {
    return { width: config.width, height: config.height };
}

function processFailure(result: ProcessResult, timeoutMs: number): string | null {
    if (result.timedOut) return `timed out after ${timeoutMs}ms`;
    if (result.exitCode !== 0) {
        return result.exitCode === null ? `killed by ${result.signal ?? 'signal'}` : `exit code ${result.exitCode}; expected 0`;
    }
    return null;
}

/**
 * Functional mode: every trial generates one fixture per configured query,
 * runs the program under test on it and classifies the output against the
 * oracle. Process failures and mismatches are recorded and the run goes on.
 */
export async function runFunctional(config: HarnessConfig, deps: HarnessDeps = {}): Promise<RunSummary> {
    const { logger, resolver, report } = resolveDeps(deps);
    assertProgram(config.exec);

    const removed = prepareScratchDir(config.scratchDir);
    logger.debug({ dir: config.scratchDir, removed }, 'Scratch directory cleaned');

    const rng = new SeededRNG(config.seed);
    report(`[functional test] seed=${config.seed} size=${config.width}x${config.height} queries=${config.queries.join(',')}`);

    const records: TrialRecord[] = [];
    for (let trial = 0; trial < config.trials; trial++) {
        for (const query of config.queries) {
            const fixture = generateFixture(query, rng, {
                size: sizeOf(config),
                dir: config.scratchDir,
                trial,
                randomValidity: config.randomValidity,
                fuzzWhitespace: config.fuzzWhitespace,
            });
            logger.debug({ fixture: fixture.path, query }, 'Fixture written');

            const record = await judgeTrial(config, trial, fixture, resolver, report);
            logger.info({ trial, query, outcome: record.outcome, durationMs: record.durationMs }, 'Trial finished');
            records.push(record);
        }
    }

    const summary = summarize(config.seed, records);
    printSummary(summary, config.verbose, report);
    return summary;
}

async function judgeTrial(
    config: HarnessConfig,
    trial: number,
    fixture: Fixture,
    resolver: ReviewResolver,
    report: ReportSink
): Promise<TrialRecord> {
    const expected = expectedOutput(fixture.oracle);
    const result = await invoke(config, fixture.query, fixture.path);

    const base = {
        trial,
        query: fixture.query,
        fixture: fixture.path,
        expected,
        actual: result.stdout.trim(),
        exitCode: result.exitCode,
        durationMs: result.durationMs,
    };

    const failure = processFailure(result, config.timeoutMs);
    if (failure !== null) {
        const record: TrialRecord = { ...base, outcome: 'fail', comparison: null, reason: failure };
        await reportFailure(record, result.stderr, resolver, report);
        return record;
    }

    const comparison = compareOutput(result.stdout, expected);
    if (comparison.verdict === 'pass') {
        return { ...base, outcome: 'pass', comparison: 'pass' };
    }

    if (comparison.verdict === 'needs-review') {
        report(`[UNCERTAIN] ${fixture.query} ${fixture.path}`);
        report(`  expected: ${comparison.expected}`);
        report(`  actual:   ${comparison.actual}`);
        const decision = await resolver.review({
            query: fixture.query,
            fixture: fixture.path,
            expected: comparison.expected,
            actual: comparison.actual,
        });
        report(`  operator: ${decision}`);
        return {
            ...base,
            outcome: decision === 'accept' ? 'pass' : 'fail',
            comparison: 'needs-review',
            review: decision,
            reason: decision === 'accept' ? undefined : 'uncertain match rejected',
        };
    }

    const record: TrialRecord = { ...base, outcome: 'fail', comparison: 'fail', reason: 'output mismatch' };
    await reportFailure(record, result.stderr, resolver, report);
    return record;
}

async function reportFailure(record: TrialRecord, stderr: string, resolver: ReviewResolver, report: ReportSink): Promise<void> {
    report(`[FAIL] ${record.query} ${record.fixture}: ${record.reason ?? 'failed'}`);
    report(`  expected: ${record.expected}`);
    report(`  actual:   ${record.actual}`);
    if (stderr.trim() !== '') report(`  stderr:   ${stderr.trim()}`);
    await resolver.acknowledge({
        query: record.query,
        fixture: record.fixture,
        expected: record.expected,
        actual: record.actual,
        reason: record.reason ?? 'failed',
    });
}

function summarize(seed: number, records: TrialRecord[]): RunSummary {
    return {
        seed,
        records,
        passed: records.filter(r => r.outcome === 'pass').length,
        failed: records.filter(r => r.outcome === 'fail').length,
        processFailures: records.filter(r => r.comparison === null).length,
        reviewedAccepted: records.filter(r => r.review === 'accept').length,
        reviewedRejected: records.filter(r => r.review === 'reject').length,
        timing: summarizeDurations(records.map(r => r.durationMs)),
    };
}

function printSummary(summary: RunSummary, verbose: boolean, report: ReportSink): void {
    if (verbose) {
        for (const r of summary.records) {
            const review = r.review ? ` review=${r.review}` : '';
            report(`  #${r.trial} ${r.query.padEnd(6)} ${r.outcome.toUpperCase().padEnd(4)} ${r.durationMs.toFixed(2)}ms${review} ${r.fixture}`);
        }
    }
    report(`=== RESULT ===`);
    report(`PASSED: ${summary.passed}`);
    report(`FAILED: ${summary.failed} (process failures: ${summary.processFailures}, rejected reviews: ${summary.reviewedRejected})`);
    report(`Timing: ${formatTiming(summary.timing)}`);
}

/**
 * Timed mode: output is not judged, only wall-clock duration. A non-zero exit
 * invalidates the measurement and aborts the run.
 */
export async function runTimed(config: HarnessConfig, deps: HarnessDeps = {}): Promise<TimingStats> {
    const { logger, report } = resolveDeps(deps);
    assertProgram(config.exec);
    prepareScratchDir(config.scratchDir);

    const rng = new SeededRNG(config.seed);
    report(`[timed test] seed=${config.seed} size=${config.width}x${config.height}`);

    const durations: number[] = [];
    for (let trial = 0; trial < config.trials; trial++) {
        const query = config.queries[trial % config.queries.length];
        const fixture = generateFixture(query, rng, {
            size: sizeOf(config),
            dir: config.scratchDir,
            trial,
            fuzzWhitespace: config.fuzzWhitespace,
        });

        const result = await invoke(config, query, fixture.path);
        const failure = processFailure(result, config.timeoutMs);
        if (failure !== null) {
            throw new ProcessFailureError(
                `Failed test. ${config.exec} ${query} ${fixture.path}: ${failure}`,
                result.exitCode,
                result.stderr
            );
        }

        durations.push(result.durationMs);
        logger.debug({ trial, query, durationMs: result.durationMs }, 'Timed trial finished');
        report(`Test took: ${result.durationMs.toFixed(2)}ms`);
    }

    const stats = summarizeDurations(durations);
    report(`Timing: ${formatTiming(stats)}`);
    return stats;
}

export interface ConformanceCase {
    name: string;
    query: Query;
    bitmap: Bitmap;
    oracle: Oracle;
}

export interface ConformanceResult {
    name: string;
    query: Query;
    expected: string;
    actual: string;
    verdict: Verdict;
    /** Set when the output matches the oracle with row and column swapped. */
    columnMajor: boolean;
}

/**
 * Hand-built fixtures whose answers differ under row-major and column-major
 * serialization, plus an empty bitmap.
 */
export function conformanceCases(): ConformanceCase[] {
    const h = new Bitmap({ width: 5, height: 4 });
    const hl = hline(2, 1, 3);
    h.fillLine(hl);

    const v = new Bitmap({ width: 5, height: 4 });
    const vl = vline(3, 0, 2);
    v.fillLine(vl);

    const s = new Bitmap({ width: 5, height: 5 });
    const sq = square(1, 2, 2);
    s.fillSquare(sq);

    return [
        { name: 'hline', query: 'hline', bitmap: h, oracle: { kind: 'line', axis: 'hline', line: hl } },
        { name: 'vline', query: 'vline', bitmap: v, oracle: { kind: 'line', axis: 'vline', line: vl } },
        { name: 'square', query: 'square', bitmap: s, oracle: { kind: 'square', square: sq } },
        { name: 'empty', query: 'hline', bitmap: new Bitmap({ width: 3, height: 3 }), oracle: { kind: 'none' } },
    ];
}

function swapAxes(wire: string): string {
    const parts = wire.split(/\s+/);
    if (parts.length !== 4) return wire;
    return [parts[1], parts[0], parts[3], parts[2]].join(' ');
}

/**
 * Checks the program under test prints coordinates in the canonical
 * `row col row col` order.
 */
export async function checkConformance(config: HarnessConfig, deps: HarnessDeps = {}): Promise<ConformanceResult[]> {
    const { logger, report } = resolveDeps(deps);
    assertProgram(config.exec);
    prepareScratchDir(config.scratchDir);

    const rng = new SeededRNG(config.seed);
    const results: ConformanceResult[] = [];

    for (const c of conformanceCases()) {
        const fixturePath = path.join(config.scratchDir, `conformance_${c.name}.txt`);
        writeBitmap(fixturePath, c.bitmap, rng);

        const expected = expectedOutput(c.oracle);
        const result = await invoke(config, c.query, fixturePath);
        const failure = processFailure(result, config.timeoutMs);
        const comparison = compareOutput(result.stdout, expected);
        const verdict: Verdict = failure !== null ? 'fail' : comparison.verdict;
        const columnMajor = verdict !== 'pass' && comparison.actual === swapAxes(expected) && comparison.actual !== expected;

        results.push({ name: c.name, query: c.query, expected, actual: comparison.actual, verdict, columnMajor });
        logger.debug({ case: c.name, verdict }, 'Conformance case finished');

        const note = columnMajor ? ' (column-major output)' : failure !== null ? ` (${failure})` : '';
        report(`[${verdict === 'pass' ? 'PASS' : verdict === 'fail' ? 'FAIL' : 'UNCERTAIN'}] conformance ${c.name}: expected "${expected}" got "${comparison.actual}"${note}`);
    }
    return results;
}
