import * as fs from 'fs';
import * as path from 'path';
import { Bitmap, type BitmapSize } from './geometry.js';
import type { SeededRNG } from './rng.js';

/** Characters a whitespace-fuzzed separator or line end is drawn from. */
export const FUZZ_WHITESPACE = [' ', '\t', '\n', '\v', '\f', '\r'] as const;

export const FUZZ_WHITESPACE_MAX_RUN = 10;

/** Printable, non-whitespace ASCII minus the two valid bit characters. */
export const INVALID_SYMBOLS: readonly string[] = Array.from({ length: 0x7E - 0x21 + 1 }, (_, i) => String.fromCharCode(0x21 + i))
    .filter(c => c !== '0' && c !== '1');

export interface WriteOptions {
    /** Inject wrong dimensions and invalid cell symbols. */
    corrupt?: boolean;
    /** Resample every separator and line end as a random whitespace run. */
    fuzzWhitespace?: boolean;
}

export interface WriteReport {
    /** Dimensions as written in the header (may differ from the grid under `corrupt`). */
    header: BitmapSize;
    headerAltered: boolean;
    corruptedCells: number;
    /** Whether a conforming parser must accept the file. */
    valid: boolean;
}

export interface SerializedBitmap {
    text: string;
    report: WriteReport;
}

/** Every cell independently set with probability 0.5. */
export function randomBitmap(size: BitmapSize, rng: SeededRNG): Bitmap {
    const bmp = new Bitmap(size);
    for (let r = 0; r < size.height; r++) {
        for (let c = 0; c < size.width; c++) {
            bmp.set(r, c, rng.chance(0.5) ? 1 : 0);
        }
    }
    return bmp;
}

export function serializeBitmap(bitmap: Bitmap, rng: SeededRNG, options: WriteOptions = {}): SerializedBitmap {
    const { corrupt = false, fuzzWhitespace = false } = options;

    const sep = (): string => fuzzWhitespace ? whitespaceRun(rng) : ' ';
    const lineEnd = (): string => fuzzWhitespace ? whitespaceRun(rng) : '\n';

    let height = bitmap.height;
    let width = bitmap.width;
    if (corrupt) {
        if (rng.chance(0.5)) height = rng.between(0, bitmap.height);
        if (rng.chance(0.5)) width = rng.between(0, bitmap.width);
    }
    const headerAltered = height !== bitmap.height || width !== bitmap.width;

    const parts: string[] = [String(height), sep(), String(width), lineEnd()];
    let corruptedCells = 0;

    for (let r = 0; r < bitmap.height; r++) {
        for (let c = 0; c < bitmap.width; c++) {
            if (c > 0) parts.push(sep());
            if (corrupt && rng.chance(0.5)) {
                parts.push(rng.pick(INVALID_SYMBOLS));
                corruptedCells++;
            } else {
                parts.push(bitmap.get(r, c) === 1 ? '1' : '0');
            }
        }
        parts.push(lineEnd());
    }

    return {
        text: parts.join(''),
        report: {
            header: { width, height },
            headerAltered,
            corruptedCells,
            valid: !headerAltered && corruptedCells === 0,
        },
    };
}

/**
 * Serializes and writes `bitmap` to `filePath`, creating parent directories.
 */
export function writeBitmap(filePath: string, bitmap: Bitmap, rng: SeededRNG, options: WriteOptions = {}): WriteReport {
    const { text, report } = serializeBitmap(bitmap, rng, options);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, text);
    return report;
}

function whitespaceRun(rng: SeededRNG): string {
    const length = rng.between(1, FUZZ_WHITESPACE_MAX_RUN);
    let out = '';
    for (let i = 0; i < length; i++) out += rng.pick(FUZZ_WHITESPACE);
    return out;
}
