/**
 * Nearest-rank percentile from an ascending array.
 * Index = ceil(p/100 * n) - 1, so the result is always an observed value.
 */
export function percentile(sorted: readonly number[], p: number): number | null {
    if (sorted.length === 0) return null;
    const index = Math.ceil((p * sorted.length) / 100) - 1;
    return sorted[Math.min(sorted.length - 1, Math.max(0, index))] ?? null;
}

export interface LatencyStats {
    lastMs: number | null;
    p95Ms: number | null;
    meanMs: number | null;
}

export const EMPTY_LATENCY_STATS: LatencyStats = { lastMs: null, p95Ms: null, meanMs: null };

/**
 * last / p95 / mean of values in arrival order.
 */
export function summarize(values: readonly number[]): LatencyStats {
    if (values.length === 0) return EMPTY_LATENCY_STATS;

    const sorted = [...values].sort((a, b) => a - b);
    const sum = values.reduce((a, b) => a + b, 0);

    return {
        lastMs: values[values.length - 1] ?? null,
        p95Ms: percentile(sorted, 95),
        meanMs: sum / values.length,
    };
}
