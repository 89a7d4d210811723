import {
    Bitmap,
    assertBitmapSize,
    compareLines,
    hline,
    vline,
    type BitmapSize,
    type Line,
    type LineAxis,
} from './geometry.js';
import type { SeededRNG } from './rng.js';

/** Inclusive cell range along one row or column. */
export interface Segment {
    begin: number;
    end: number;
}

export interface LineFixture {
    bitmap: Bitmap;
    /** Longest run; ties go to the smaller row, then the smaller column. */
    oracle: Line;
    /** Segments per row (hline) or per column (vline), in generation order. */
    segments: Segment[][];
    /** Best line of each row/column. */
    localMaxima: Line[];
}

/**
 * Upper bound for the per-call maximum segment length. Vertical runs are
 * capped at a third of the column.
 */
export function maxSegmentBound(extent: number, axis: LineAxis): number {
    const last = extent - 1;
    return axis === 'hline' ? last : Math.floor(last / 3);
}

/**
 * Fills one row/column of `extent` cells with disjoint runs. Consecutive runs
 * are separated by at least one empty cell, so each segment is exactly one
 * maximal run once drawn.
 */
export function synthesizeSegments(extent: number, axis: LineAxis, rng: SeededRNG): Segment[] {
    const segments: Segment[] = [];
    if (extent <= 0) return segments;

    const last = extent - 1;
    const maxlen = rng.between(0, maxSegmentBound(extent, axis));

    let cursor = 0;
    while (cursor + maxlen <= last) {
        const begin = rng.between(cursor, cursor + maxlen);
        const end = rng.between(begin, Math.min(begin + maxlen, last));
        segments.push({ begin, end });
        cursor = end + 2;
    }
    return segments;
}

function toLine(axis: LineAxis, lane: number, segment: Segment): Line {
    return axis === 'hline'
        ? hline(lane, segment.begin, segment.end)
        : vline(lane, segment.begin, segment.end);
}

export interface LaneSegments {
    segments: Segment[];
    /** Zero-length line at the lane origin when no segment was emitted. */
    longest: Line;
}

/**
 * Segments of one lane (row index for hline, column index for vline) and
 * the best of them as a Line.
 */
export function synthesizeLane(extent: number, axis: LineAxis, lane: number, rng: SeededRNG): LaneSegments {
    const segments = synthesizeSegments(extent, axis, rng);
    let longest = toLine(axis, lane, { begin: 0, end: 0 });
    segments.forEach((segment, i) => {
        const line = toLine(axis, lane, segment);
        if (i === 0 || compareLines(line, longest) > 0) longest = line;
    });
    return { segments, longest };
}

export function synthesizeLineFixture(size: BitmapSize, axis: LineAxis, rng: SeededRNG): LineFixture {
    assertBitmapSize(size);
    const bitmap = new Bitmap(size);

    // hline walks rows across columns; vline walks columns down rows
    const lanes = axis === 'hline' ? size.height : size.width;
    const extent = axis === 'hline' ? size.width : size.height;

    const segments: Segment[][] = [];
    const localMaxima: Line[] = [];
    let oracle: Line | null = null;

    for (let lane = 0; lane < lanes; lane++) {
        const result = synthesizeLane(extent, axis, lane, rng);
        for (const segment of result.segments) {
            bitmap.fillLine(toLine(axis, lane, segment));
        }

        segments.push(result.segments);
        localMaxima.push(result.longest);
        if (oracle === null || compareLines(result.longest, oracle) > 0) {
            oracle = result.longest;
        }
    }

    return {
        bitmap,
        oracle: oracle ?? toLine(axis, 0, { begin: 0, end: 0 }),
        segments,
        localMaxima,
    };
}
