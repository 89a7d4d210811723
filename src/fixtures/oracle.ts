import { formatLine, formatSquare, type Line, type LineAxis, type Square } from './geometry.js';

export type Query = 'test' | LineAxis | 'square';

export const QUERIES: readonly Query[] = ['test', 'hline', 'vline', 'square'];

export const NOT_FOUND = 'Not found';

/** Ground truth computed alongside a fixture; consumed once by the comparator. */
export type Oracle =
    | { kind: 'validity'; valid: boolean }
    | { kind: 'line'; axis: LineAxis; line: Line }
    | { kind: 'square'; square: Square }
    | { kind: 'none' };

export function isQuery(value: string): value is Query {
    return QUERIES.some(q => q === value);
}

/** What the program under test must print for `oracle`. */
export function expectedOutput(oracle: Oracle): string {
    switch (oracle.kind) {
        case 'validity':
            return oracle.valid ? 'Valid' : 'Invalid';
        case 'line':
            return formatLine(oracle.line);
        case 'square':
            return formatSquare(oracle.square);
        case 'none':
            return NOT_FOUND;
    }
}
