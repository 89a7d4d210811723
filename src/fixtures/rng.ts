/**
 * Deterministic RNG threaded through every fixture generator.
 * Implementation: Mulberry32 (Fast, decent quality, 32-bit state).
 */
export class SeededRNG {
    private state: number;

    constructor(readonly seed: number) {
        this.state = seed >>> 0;
    }

    private nextInt32(): number {
        let t = this.state = (this.state + 0x6D2B79F5) >>> 0;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0);
    }

    /**
     * Returns a float between [0, 1)
     */
    next(): number {
        return this.nextInt32() / 4294967296;
    }

    /**
     * Returns integer in [min, max)
     */
    nextInt(min: number, max: number): number {
        return Math.floor(this.next() * (max - min)) + min;
    }

    /**
     * Returns integer in [min, max], both ends inclusive.
     */
    between(min: number, max: number): number {
        if (max < min) {
            throw new RangeError(`SeededRNG.between: empty range [${min}, ${max}]`);
        }
        return this.nextInt(min, max + 1);
    }

    /** True with probability `p`. */
    chance(p: number = 0.5): boolean {
        return this.next() < p;
    }

    pick<T>(items: readonly T[]): T {
        if (items.length === 0) {
            throw new RangeError('SeededRNG.pick: no items');
        }
        return items[this.nextInt(0, items.length)];
    }

    /** Lowercase hex string of `length` characters. */
    hex(length: number): string {
        let out = '';
        while (out.length < length) {
            out += this.nextInt32().toString(16).padStart(8, '0');
        }
        return out.slice(0, length);
    }
}
