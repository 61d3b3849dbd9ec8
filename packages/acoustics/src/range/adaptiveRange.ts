/**
 * Adaptive display range for decibel heatmaps.
 *
 * A fixed -90..0 dB scale wastes most of the palette on levels ambient
 * recordings never reach, and one loud transient would wash out the rest.
 * The range is instead clipped to percentiles of the values actually being
 * shown, and recomputed on every render of the current batch.
 */

import type { DisplayRange } from "../types";
import { percentileAt } from "../util/stats";

export type RangeOptions = {
    /** Lower clip percentile, 0..1. */
    loPercentile: number;
    /** Upper clip percentile, 0..1. */
    hiPercentile: number;
    /** Minimum span of the returned range in dB. */
    minRange: number;
    /** Values at or below this are "unmeasured/silent" and ignored. */
    excludeAtOrBelow: number;
    /** Values above this are clamped to it before clipping (e.g. dbCeil). */
    ceiling?: number;
    /** Range used when the batch has no usable values. */
    fallback: DisplayRange;
};

export const DEFAULT_RANGE_OPTIONS: RangeOptions = {
    loPercentile: 0.02,
    hiPercentile: 0.98,
    minRange: 10,
    excludeAtOrBelow: -89,
    fallback: { minDb: -60, maxDb: -20 },
};

export type RangeEstimate = DisplayRange & {
    /** Number of values that survived filtering. */
    sampleCount: number;
    /** True when the fallback range was used (empty batch). */
    isFallback: boolean;
};

function assertFraction(name: string, p: number): void {
    if (!(p >= 0 && p <= 1)) {
        throw new Error(`@noisescope/acoustics: ${name} must be within [0, 1], got ${p}`);
    }
}

/** Smallest double strictly above `x` (finite `x` only). */
function nextUp(x: number): number {
    if (x === 0) return Number.MIN_VALUE;
    const bits = new Float64Array([x]);
    const word = new BigInt64Array(bits.buffer);
    word[0] = (word[0] ?? 0n) + (x > 0 ? 1n : -1n);
    return bits[0] ?? x;
}

/**
 * Widen `[min, max]` symmetrically around its midpoint to at least `minRange`.
 *
 * The upper edge is nudged up by whole ulps until the float span itself
 * reaches `minRange`.
 */
export function widenToMinimum(range: DisplayRange, minRange: number): DisplayRange {
    if (range.maxDb - range.minDb >= minRange) return range;
    const mid = (range.minDb + range.maxDb) / 2;
    const minDb = mid - minRange / 2;
    let maxDb = Math.max(mid + minRange / 2, minDb + minRange);
    while (maxDb - minDb < minRange) maxDb = nextUp(maxDb);
    return { minDb, maxDb };
}

/**
 * Estimate a display range from a batch of decibel values.
 *
 * Nulls, non-finite values and values at or below `excludeAtOrBelow` are
 * dropped; the rest are sorted and clipped at the configured percentiles.
 * An empty batch yields the fallback range. The result always spans at
 * least `minRange`.
 */
export function estimateRange(
    values: Iterable<number | null | undefined>,
    options: Partial<RangeOptions> = {}
): RangeEstimate {
    const opts: RangeOptions = { ...DEFAULT_RANGE_OPTIONS, ...options };
    assertFraction("loPercentile", opts.loPercentile);
    assertFraction("hiPercentile", opts.hiPercentile);
    if (opts.loPercentile > opts.hiPercentile) {
        throw new Error("@noisescope/acoustics: loPercentile must not exceed hiPercentile");
    }

    const kept: number[] = [];
    for (const v of values) {
        if (v === null || v === undefined || !Number.isFinite(v)) continue;
        if (v <= opts.excludeAtOrBelow) continue;
        kept.push(opts.ceiling !== undefined && v > opts.ceiling ? opts.ceiling : v);
    }

    if (kept.length === 0) {
        const range = widenToMinimum(opts.fallback, opts.minRange);
        return { ...range, sampleCount: 0, isFallback: true };
    }

    const sorted = Float64Array.from(kept).sort();
    const clipped: DisplayRange = {
        minDb: percentileAt(sorted, opts.loPercentile),
        maxDb: percentileAt(sorted, opts.hiPercentile, true),
    };

    return { ...widenToMinimum(clipped, opts.minRange), sampleCount: kept.length, isFallback: false };
}
