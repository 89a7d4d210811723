import { describe, it, expect } from 'vitest';
import { compareOutput } from '../src/harness/comparator.js';

describe('compareOutput', () => {
    it('passes an exact match after trimming', () => {
        expect(compareOutput('Invalid', 'Invalid')).toEqual({ verdict: 'pass', expected: 'Invalid', actual: 'Invalid' });
        expect(compareOutput('  3 0 3 7\n', '3 0 3 7')).toEqual({ verdict: 'pass', expected: '3 0 3 7', actual: '3 0 3 7' });
    });

    it('flags output that only contains the expected text for review', () => {
        const result = compareOutput('Error: Invalid bitmap, Invalid dims\n', 'Invalid');
        expect(result.verdict).toBe('needs-review');
        expect(result.actual).toBe('Error: Invalid bitmap, Invalid dims');
    });

    it('fails anything else', () => {
        expect(compareOutput('Valid', 'Invalid').verdict).toBe('fail');
        expect(compareOutput('1 2 3 4', '2 1 4 3').verdict).toBe('fail');
        expect(compareOutput('', 'Valid').verdict).toBe('fail');
    });

    it('does not treat a prefix of the expected text as a match', () => {
        expect(compareOutput('3 0 3', '3 0 3 7').verdict).toBe('fail');
    });
});
