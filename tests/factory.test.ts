import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { generateFixture } from '../src/fixtures/factory.js';
import { hline, square } from '../src/fixtures/geometry.js';
import { expectedOutput, isQuery, QUERIES } from '../src/fixtures/oracle.js';
import { SeededRNG } from '../src/fixtures/rng.js';
import { withTempDir } from './helpers/test-utils.js';

describe('generateFixture', () => {
    it('regenerates byte-identical files from the same seed', async () => {
        await withTempDir((dir) => {
            for (const query of QUERIES) {
                const options = { size: { width: 19, height: 13 }, trial: 2, randomValidity: true, fuzzWhitespace: true };
                const a = generateFixture(query, new SeededRNG(4242), { ...options, dir: path.join(dir, 'a') });
                const b = generateFixture(query, new SeededRNG(4242), { ...options, dir: path.join(dir, 'b') });
                expect(path.basename(a.path)).toBe(path.basename(b.path));
                expect(fs.readFileSync(a.path)).toEqual(fs.readFileSync(b.path));
                expect(a.oracle).toEqual(b.oracle);
            }
        });
    });

    it('names files after query and trial with a random suffix', async () => {
        await withTempDir((dir) => {
            const fixture = generateFixture('hline', new SeededRNG(1), { size: { width: 8, height: 8 }, dir, trial: 3 });
            expect(path.basename(fixture.path)).toMatch(/^hline_3_[0-9a-f]{8}\.txt$/);
            expect(path.dirname(fixture.path)).toBe(dir);
            expect(fixture.oracle.kind).toBe('line');
        });
    });

    it('test query without random validity always expects Valid', async () => {
        await withTempDir((dir) => {
            for (let seed = 0; seed < 10; seed++) {
                const fixture = generateFixture('test', new SeededRNG(seed), { size: { width: 6, height: 5 }, dir, trial: seed });
                expect(fixture.oracle).toEqual({ kind: 'validity', valid: true });
                expect(fs.readFileSync(fixture.path, 'utf8').startsWith('5 6\n')).toBe(true);
            }
        });
    });

    it('test query with random validity reports the branch actually written', async () => {
        await withTempDir((dir) => {
            const verdicts = new Set<boolean>();
            for (let seed = 0; seed < 40; seed++) {
                const fixture = generateFixture('test', new SeededRNG(seed), {
                    size: { width: 6, height: 5 },
                    dir,
                    trial: seed,
                    randomValidity: true,
                });
                if (fixture.oracle.kind !== 'validity') throw new Error('expected a validity oracle');
                expect(fixture.oracle.valid).toBe(fixture.report.valid);
                verdicts.add(fixture.oracle.valid);
            }
            expect(verdicts).toEqual(new Set([true, false]));
        });
    });

    it('never corrupts shape fixtures', async () => {
        await withTempDir((dir) => {
            for (const query of ['hline', 'vline', 'square'] as const) {
                const fixture = generateFixture(query, new SeededRNG(9), {
                    size: { width: 10, height: 10 },
                    dir,
                    randomValidity: true,
                });
                expect(fixture.report.valid).toBe(true);
            }
        });
    });
});

describe('expectedOutput', () => {
    it('serializes every oracle kind', () => {
        expect(expectedOutput({ kind: 'validity', valid: true })).toBe('Valid');
        expect(expectedOutput({ kind: 'validity', valid: false })).toBe('Invalid');
        expect(expectedOutput({ kind: 'line', axis: 'hline', line: hline(4, 2, 9) })).toBe('4 2 4 9');
        expect(expectedOutput({ kind: 'square', square: square(3, 1, 3) })).toBe('3 1 5 3');
        expect(expectedOutput({ kind: 'none' })).toBe('Not found');
    });

    it('recognizes query names', () => {
        expect(isQuery('vline')).toBe(true);
        expect(isQuery('--help')).toBe(false);
    });
});
