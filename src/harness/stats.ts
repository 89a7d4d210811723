export interface TimingStats {
    trials: number;
    totalMs: number;
    meanMs: number;
    minMs: number;
    maxMs: number;
}

export function summarizeDurations(durations: readonly number[]): TimingStats {
    if (durations.length === 0) {
        return { trials: 0, totalMs: 0, meanMs: 0, minMs: 0, maxMs: 0 };
    }
    let total = 0;
    let min = Infinity;
    let max = -Infinity;
    for (const d of durations) {
        total += d;
        if (d < min) min = d;
        if (d > max) max = d;
    }
    return {
        trials: durations.length,
        totalMs: total,
        meanMs: total / durations.length,
        minMs: min,
        maxMs: max,
    };
}

export function formatTiming(stats: TimingStats): string {
    return `trials=${stats.trials} mean=${stats.meanMs.toFixed(2)}ms min=${stats.minMs.toFixed(2)}ms max=${stats.maxMs.toFixed(2)}ms total=${stats.totalMs.toFixed(2)}ms`;
}
