import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { compareSquares, squareSide } from '../src/fixtures/geometry.js';
import { SeededRNG } from '../src/fixtures/rng.js';
import { MAX_SQUARES, maxSquareSide, synthesizeSquareFixture } from '../src/fixtures/squares.js';

describe('square synthesizer', () => {
    it('bounds the side at a quarter of the shorter edge, never below 1', () => {
        expect(maxSquareSide({ width: 4, height: 4 })).toBe(1);
        expect(maxSquareSide({ width: 40, height: 13 })).toBe(3);
        expect(maxSquareSide({ width: 2, height: 3 })).toBe(1);
        expect(maxSquareSide({ width: 1, height: 1 })).toBe(1);
    });

    it('on a 4x4 grid every square is one cell and the smallest (row, col) wins', () => {
        for (let seed = 0; seed < 25; seed++) {
            const fixture = synthesizeSquareFixture({ width: 4, height: 4 }, new SeededRNG(seed));
            for (const sq of fixture.squares) expect(squareSide(sq)).toBe(1);

            const smallest = [...fixture.squares].sort((a, b) =>
                a.topLeft.row - b.topLeft.row || a.topLeft.col - b.topLeft.col
            )[0];
            expect(fixture.oracle).toEqual(smallest);
        }
    });

    it('oracle lies inside the grid and ranks first among the stamped squares', () => {
        fc.assert(fc.property(
            fc.integer({ min: 1, max: 64 }),
            fc.integer({ min: 1, max: 64 }),
            fc.integer({ min: 0, max: 0x7fffffff }),
            (width, height, seed) => {
                const fixture = synthesizeSquareFixture({ width, height }, new SeededRNG(seed));
                const { topLeft, bottomRight } = fixture.oracle;

                expect(topLeft.row).toBeGreaterThanOrEqual(0);
                expect(topLeft.col).toBeGreaterThanOrEqual(0);
                expect(bottomRight.row).toBeLessThan(height);
                expect(bottomRight.col).toBeLessThan(width);

                expect(fixture.squares.length).toBeGreaterThanOrEqual(1);
                expect(fixture.squares.length).toBeLessThanOrEqual(MAX_SQUARES);
                for (const sq of fixture.squares) {
                    expect(squareSide(sq)).toBeLessThanOrEqual(maxSquareSide({ width, height }));
                    expect(compareSquares(fixture.oracle, sq)).toBeGreaterThanOrEqual(0);
                }
                expect(fixture.squares).toContainEqual(fixture.oracle);
            }
        ));
    });

    it('stamps every square footprint onto the grid', () => {
        const fixture = synthesizeSquareFixture({ width: 32, height: 32 }, new SeededRNG(404));
        for (const sq of fixture.squares) {
            for (let r = sq.topLeft.row; r <= sq.bottomRight.row; r++) {
                for (let c = sq.topLeft.col; c <= sq.bottomRight.col; c++) {
                    expect(fixture.bitmap.get(r, c)).toBe(1);
                }
            }
        }
    });
});
