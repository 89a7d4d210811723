import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { prepareScratchDir } from '../src/harness/scratch.js';
import { PreconditionViolationError } from '../src/errors.js';
import { withTempDir } from './helpers/test-utils.js';

describe('prepareScratchDir', () => {
    it('creates a missing directory', async () => {
        await withTempDir((dir) => {
            const scratch = path.join(dir, 'nested', 'scratch');
            expect(prepareScratchDir(scratch)).toBe(0);
            expect(fs.statSync(scratch).isDirectory()).toBe(true);
        });
    });

    it('removes every regular file', async () => {
        await withTempDir((dir) => {
            fs.writeFileSync(path.join(dir, 'hline_0_aa.txt'), '1 1\n1\n');
            fs.writeFileSync(path.join(dir, 'test_1_bb.txt'), '1 1\n0\n');
            expect(prepareScratchDir(dir)).toBe(2);
            expect(fs.readdirSync(dir)).toEqual([]);
        });
    });

    it('refuses to clean a directory holding a subdirectory', async () => {
        await withTempDir((dir) => {
            fs.writeFileSync(path.join(dir, 'keep.txt'), 'x');
            fs.mkdirSync(path.join(dir, 'sub'));
            expect(() => prepareScratchDir(dir)).toThrow(PreconditionViolationError);
            expect(fs.readdirSync(dir).sort()).toEqual(['keep.txt', 'sub']);
        });
    });
});
