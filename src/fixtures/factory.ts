import * as path from 'path';
import { randomBitmap, writeBitmap, type WriteReport } from './bitmap-writer.js';
import type { Bitmap, BitmapSize } from './geometry.js';
import type { Oracle, Query } from './oracle.js';
import type { SeededRNG } from './rng.js';
import { synthesizeLineFixture } from './segments.js';
import { synthesizeSquareFixture } from './squares.js';

export interface FixtureOptions {
    size: BitmapSize;
    /** Directory the fixture file is written to. */
    dir: string;
    /** Trial index, part of the file name. */
    trial?: number;
    /** `test` query only: coin-flip between a valid and a corrupted file. */
    randomValidity?: boolean;
    fuzzWhitespace?: boolean;
}

export interface Fixture {
    query: Query;
    path: string;
    oracle: Oracle;
    size: BitmapSize;
    report: WriteReport;
}

interface Grid {
    bitmap: Bitmap;
    corrupt: boolean;
    oracle: (report: WriteReport) => Oracle;
}

function buildGrid(query: Query, size: BitmapSize, rng: SeededRNG, randomValidity: boolean): Grid {
    switch (query) {
        case 'test': {
            const corrupt = randomValidity && rng.chance(0.5);
            return {
                bitmap: randomBitmap(size, rng),
                corrupt,
                oracle: report => ({ kind: 'validity', valid: report.valid }),
            };
        }
        case 'hline':
        case 'vline': {
            const fixture = synthesizeLineFixture(size, query, rng);
            return {
                bitmap: fixture.bitmap,
                corrupt: false,
                oracle: () => ({ kind: 'line', axis: query, line: fixture.oracle }),
            };
        }
        case 'square': {
            const fixture = synthesizeSquareFixture(size, rng);
            return {
                bitmap: fixture.bitmap,
                corrupt: false,
                oracle: () => ({ kind: 'square', square: fixture.oracle }),
            };
        }
    }
}

/**
 * Generates the grid for `query`, writes it under `options.dir` and returns
 * the oracle computed in the same pass. Identical seeds and options yield
 * byte-identical files.
 */
export function generateFixture(query: Query, rng: SeededRNG, options: FixtureOptions): Fixture {
    const grid = buildGrid(query, options.size, rng, options.randomValidity ?? false);
    const fileName = `${query}_${options.trial ?? 0}_${rng.hex(8)}.txt`;
    const filePath = path.join(options.dir, fileName);

    const report = writeBitmap(filePath, grid.bitmap, rng, {
        corrupt: grid.corrupt,
        fuzzWhitespace: options.fuzzWhitespace ?? false,
    });

    return {
        query,
        path: filePath,
        oracle: grid.oracle(report),
        size: options.size,
        report,
    };
}
