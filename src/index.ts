/**
 * bitmap-oracle public API
 *
 * @module bitmap-oracle
 */

export { SeededRNG } from './fixtures/rng.js';
export {
    Bitmap,
    assertBitmapSize,
    compareLines,
    compareSquares,
    formatLine,
    formatSquare,
    hline,
    lineLength,
    point,
    square,
    squareSide,
    vline,
} from './fixtures/geometry.js';
export type { Bit, BitmapSize, Line, LineAxis, Point, Square } from './fixtures/geometry.js';
export {
    FUZZ_WHITESPACE,
    INVALID_SYMBOLS,
    randomBitmap,
    serializeBitmap,
    writeBitmap,
} from './fixtures/bitmap-writer.js';
export type { SerializedBitmap, WriteOptions, WriteReport } from './fixtures/bitmap-writer.js';
export { maxSegmentBound, synthesizeLane, synthesizeLineFixture, synthesizeSegments } from './fixtures/segments.js';
export type { LaneSegments, LineFixture, Segment } from './fixtures/segments.js';
export { MAX_SQUARES, maxSquareSide, synthesizeSquareFixture } from './fixtures/squares.js';
export type { SquareFixture } from './fixtures/squares.js';
export { NOT_FOUND, QUERIES, expectedOutput, isQuery } from './fixtures/oracle.js';
export type { Oracle, Query } from './fixtures/oracle.js';
export { generateFixture } from './fixtures/factory.js';
export type { Fixture, FixtureOptions } from './fixtures/factory.js';

export { compareOutput } from './harness/comparator.js';
export type { Comparison, Verdict } from './harness/comparator.js';
export { autoRejectResolver, createConsoleResolver } from './harness/review.js';
export type { ConsoleIO, FailureNotice, ReviewDecision, ReviewRequest, ReviewResolver } from './harness/review.js';
export { prepareScratchDir } from './harness/scratch.js';
export { runProgram } from './harness/spawn.js';
export type { ProcessResult, RunOptions } from './harness/spawn.js';
export { formatTiming, summarizeDurations } from './harness/stats.js';
export type { TimingStats } from './harness/stats.js';
export { assertProgram, checkConformance, conformanceCases, runFunctional, runTimed } from './harness/harness.js';
export type { ConformanceCase, ConformanceResult, HarnessDeps, ReportSink, RunSummary, TrialRecord } from './harness/harness.js';

export { HarnessConfigSchema, loadConfig } from './config.js';
export type { HarnessConfig, HarnessConfigInput, HarnessMode } from './config.js';
export { createLogger, silentLogger } from './logger.js';
export type { LogLevel, Logger } from './logger.js';
export {
    ConfigError,
    HarnessError,
    PreconditionViolationError,
    ProcessFailureError,
    ProcessLaunchError,
} from './errors.js';
