export type Verdict = 'pass' | 'fail' | 'needs-review';

export interface Comparison {
    verdict: Verdict;
    expected: string;
    actual: string;
}

/**
 * Tri-state output check. Both sides are trimmed; an exact match passes, an
 * output that merely contains the expected text needs a human decision, and
 * anything else fails.
 */
export function compareOutput(actual: string, expected: string): Comparison {
    const a = actual.trim();
    const e = expected.trim();

    let verdict: Verdict;
    if (a === e) {
        verdict = 'pass';
    } else if (a.includes(e)) {
        verdict = 'needs-review';
    } else {
        verdict = 'fail';
    }
    return { verdict, expected: e, actual: a };
}
