import * as readline from 'readline/promises';
import type { Query } from '../fixtures/oracle.js';

export type ReviewDecision = 'accept' | 'reject';

export interface ReviewRequest {
    query: Query;
    fixture: string;
    expected: string;
    actual: string;
}

export interface FailureNotice extends ReviewRequest {
    reason: string;
}

/**
 * Decides uncertain matches and receives failure acknowledgements. Every
 * needs-review verdict goes through `review`; its answer is the final verdict.
 */
export interface ReviewResolver {
    review(request: ReviewRequest): Promise<ReviewDecision>;
    acknowledge(notice: FailureNotice): Promise<void>;
    close?(): void;
}

/** Unattended runs: uncertain matches count as failures, nothing blocks. */
export const autoRejectResolver: ReviewResolver = {
    review: async () => 'reject',
    acknowledge: async () => {},
};

export interface ConsoleIO {
    input: NodeJS.ReadableStream;
    output: NodeJS.WritableStream;
}

/**
 * Interactive resolver: shows expected vs actual and asks the operator.
 * Only an explicit `y`/`yes` accepts. Once the input has ended it behaves
 * like {@link autoRejectResolver}.
 */
export function createConsoleResolver(io: ConsoleIO = { input: process.stdin, output: process.stdout }): ReviewResolver {
    const rl = readline.createInterface({ input: io.input, output: io.output, terminal: false });
    let closed = false;
    rl.on('close', () => {
        closed = true;
    });

    // null when the input ended before (or while) asking
    const ask = (prompt: string): Promise<string | null> => {
        if (closed) return Promise.resolve(null);
        return new Promise((resolve, reject) => {
            const onClose = () => resolve(null);
            rl.once('close', onClose);
            rl.question(prompt).then(
                answer => {
                    rl.off('close', onClose);
                    resolve(answer);
                },
                (err: unknown) => {
                    rl.off('close', onClose);
                    if (closed) resolve(null);
                    else reject(err);
                }
            );
        });
    };

    return {
        async review(request) {
            io.output.write(`[REVIEW] ${request.query} ${request.fixture}\n`);
            io.output.write(`  expected: ${request.expected}\n`);
            io.output.write(`  actual:   ${request.actual}\n`);
            const answer = await ask('Accept output? [y/N] ');
            return answer !== null && /^y(es)?$/i.test(answer.trim()) ? 'accept' : 'reject';
        },
        async acknowledge(notice) {
            await ask(`[FAIL] ${notice.query} ${notice.fixture}: ${notice.reason}. Press Enter to continue `);
        },
        close() {
            rl.close();
        },
    };
}
