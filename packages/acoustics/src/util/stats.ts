export type MinMax = {
    min: number;
    max: number;
};

/**
 * Compute min/max in a single pass without using spread / Math.min(...arr).
 *
 * Null and non-finite entries are skipped. Returns `null` when nothing is left.
 */
export function minMax(values: ArrayLike<number | null>): MinMax | null {
    let min = Infinity;
    let max = -Infinity;

    for (let i = 0; i < values.length; i++) {
        const v = values[i];
        if (v === null || v === undefined || !Number.isFinite(v)) continue;
        if (v < min) min = v;
        if (v > max) max = v;
    }

    return Number.isFinite(min) ? { min, max } : null;
}

/** Arithmetic mean of the non-null, finite entries; `null` when there are none. */
export function meanOf(values: Iterable<number | null>): number | null {
    let sum = 0;
    let count = 0;
    for (const v of values) {
        if (v === null || !Number.isFinite(v)) continue;
        sum += v;
        count++;
    }
    return count > 0 ? sum / count : null;
}

/**
 * Value at a fractional percentile `p` (0..1) of an ascending array,
 * taken at index `floor(p * (n - 1))` (or `ceil` when `roundUp`).
 */
export function percentileAt(sorted: ArrayLike<number>, p: number, roundUp = false): number {
    const n = sorted.length;
    if (n === 0) return Number.NaN;
    const pos = p * (n - 1);
    const idx = roundUp ? Math.ceil(pos) : Math.floor(pos);
    return sorted[Math.min(n - 1, Math.max(0, idx))] ?? Number.NaN;
}
