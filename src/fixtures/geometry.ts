import { PreconditionViolationError } from '../errors.js';

export type Bit = 0 | 1;

export interface BitmapSize {
    readonly width: number;
    readonly height: number;
}

export interface Point {
    readonly row: number;
    readonly col: number;
}

/** Horizontal lines share `row`, vertical lines share `col`. */
export interface Line {
    readonly begin: Point;
    readonly end: Point;
}

export interface Square {
    readonly topLeft: Point;
    readonly bottomRight: Point;
}

export type LineAxis = 'hline' | 'vline';

export function assertBitmapSize(size: BitmapSize): void {
    for (const [name, value] of [['width', size.width], ['height', size.height]] as const) {
        if (!Number.isInteger(value) || value <= 0) {
            throw new PreconditionViolationError(`Bitmap ${name} must be a positive integer, got ${value}`);
        }
    }
}

export function point(row: number, col: number): Point {
    return { row, col };
}

export function hline(row: number, beginCol: number, endCol: number): Line {
    return { begin: point(row, beginCol), end: point(row, endCol) };
}

export function vline(col: number, beginRow: number, endRow: number): Line {
    return { begin: point(beginRow, col), end: point(endRow, col) };
}

export function square(top: number, left: number, side: number): Square {
    return { topLeft: point(top, left), bottomRight: point(top + side - 1, left + side - 1) };
}

/**
 * Coordinate difference along the varying axis. A single-cell line has
 * length 0.
 */
export function lineLength(line: Line): number {
    if (line.begin.row === line.end.row) {
        return Math.abs(line.end.col - line.begin.col);
    }
    return Math.abs(line.end.row - line.begin.row);
}

export function squareSide(sq: Square): number {
    return sq.bottomRight.row - sq.topLeft.row + 1;
}

function comparePosition(lhs: Point, rhs: Point): number {
    if (lhs.row !== rhs.row) return rhs.row - lhs.row;
    return rhs.col - lhs.col;
}

/**
 * Positive when `lhs` ranks above `rhs`: longer first, then smaller begin
 * row, then smaller begin column.
 */
export function compareLines(lhs: Line, rhs: Line): number {
    const delta = lineLength(lhs) - lineLength(rhs);
    if (delta !== 0) return delta;
    return comparePosition(lhs.begin, rhs.begin);
}

/** Larger side first, then smaller top row, then smaller left column. */
export function compareSquares(lhs: Square, rhs: Square): number {
    const delta = squareSide(lhs) - squareSide(rhs);
    if (delta !== 0) return delta;
    return comparePosition(lhs.topLeft, rhs.topLeft);
}

/** Four integers, row before column, begin point first. */
export function formatLine(line: Line): string {
    return `${line.begin.row} ${line.begin.col} ${line.end.row} ${line.end.col}`;
}

export function formatSquare(sq: Square): string {
    return `${sq.topLeft.row} ${sq.topLeft.col} ${sq.bottomRight.row} ${sq.bottomRight.col}`;
}

/**
 * Fixed-size grid of bits, stored row-major.
 */
export class Bitmap {
    private readonly cells: Uint8Array;

    constructor(readonly size: BitmapSize) {
        assertBitmapSize(size);
        this.cells = new Uint8Array(size.width * size.height);
    }

    get width(): number {
        return this.size.width;
    }

    get height(): number {
        return this.size.height;
    }

    get(row: number, col: number): Bit {
        return this.cells[this.offset(row, col)] === 1 ? 1 : 0;
    }

    set(row: number, col: number, bit: Bit): void {
        this.cells[this.offset(row, col)] = bit;
    }

    row(row: number): Bit[] {
        const out: Bit[] = [];
        for (let col = 0; col < this.width; col++) out.push(this.get(row, col));
        return out;
    }

    fillLine(line: Line): void {
        const rows = [line.begin.row, line.end.row].sort((a, b) => a - b);
        const cols = [line.begin.col, line.end.col].sort((a, b) => a - b);
        for (let r = rows[0]; r <= rows[1]; r++) {
            for (let c = cols[0]; c <= cols[1]; c++) this.set(r, c, 1);
        }
    }

    fillSquare(sq: Square): void {
        for (let r = sq.topLeft.row; r <= sq.bottomRight.row; r++) {
            for (let c = sq.topLeft.col; c <= sq.bottomRight.col; c++) this.set(r, c, 1);
        }
    }

    countSet(): number {
        let n = 0;
        for (const cell of this.cells) n += cell;
        return n;
    }

    private offset(row: number, col: number): number {
        if (!Number.isInteger(row) || !Number.isInteger(col) ||
            row < 0 || row >= this.height || col < 0 || col >= this.width) {
            throw new RangeError(`Cell (${row}, ${col}) outside ${this.height}x${this.width} bitmap`);
        }
        return row * this.width + col;
    }
}
