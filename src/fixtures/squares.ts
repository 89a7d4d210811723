import { Bitmap, assertBitmapSize, compareSquares, square, type BitmapSize, type Square } from './geometry.js';
import type { SeededRNG } from './rng.js';

export const MAX_SQUARES = 10;

export interface SquareFixture {
    bitmap: Bitmap;
    /** Largest stamped square; ties go to the smaller top row, then left column. */
    oracle: Square;
    /** Stamped squares in generation order. */
    squares: Square[];
}

/** Largest side a stamped square may take: a quarter of the shorter edge, at least 1. */
export function maxSquareSide(size: BitmapSize): number {
    const shorter = Math.min(size.width, size.height);
    return Math.min(shorter, Math.max(1, Math.floor(shorter / 4)));
}

/**
 * Stamps 1..10 solid squares onto an empty grid. Later squares may overlap
 * earlier ones; the oracle only ranks the stamps themselves and does not
 * account for larger squares formed by overlapping or adjacent stamps.
 */
export function synthesizeSquareFixture(size: BitmapSize, rng: SeededRNG): SquareFixture {
    assertBitmapSize(size);
    const bitmap = new Bitmap(size);
    const bound = maxSquareSide(size);
    const count = rng.between(1, MAX_SQUARES);

    const squares: Square[] = [];
    let oracle: Square | null = null;

    for (let i = 0; i < count; i++) {
        const side = rng.between(1, bound);
        const top = rng.between(0, size.height - side);
        const left = rng.between(0, size.width - side);
        const stamped = square(top, left, side);

        bitmap.fillSquare(stamped);
        squares.push(stamped);
        if (oracle === null || compareSquares(stamped, oracle) > 0) oracle = stamped;
    }

    if (oracle === null) {
        // count is drawn from [1, MAX_SQUARES]
        throw new Error('synthesizeSquareFixture: no square stamped');
    }
    return { bitmap, oracle, squares };
}
