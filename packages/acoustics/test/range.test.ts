import { describe, expect, it } from "vitest";

import { DEFAULT_RANGE_OPTIONS, estimateRange, widenToMinimum } from "../src/index";

describe("adaptive range estimator", () => {
    it("widens a constant batch symmetrically to the minimum range", () => {
        const range = estimateRange(new Array<number>(100).fill(-40));

        expect(range.minDb).toBe(-45);
        expect(range.maxDb).toBe(-35);
        expect(range.sampleCount).toBe(100);
        expect(range.isFallback).toBe(false);
    });

    it("falls back to the default range for an empty batch", () => {
        const range = estimateRange([]);
        expect(range).toEqual({ minDb: -60, maxDb: -20, sampleCount: 0, isFallback: true });
    });

    it("drops nulls, non-finite values and the floor sentinel", () => {
        const range = estimateRange([null, undefined, Number.NaN, -90, -89, -95]);
        expect(range.isFallback).toBe(true);
        expect(range.minDb).toBe(DEFAULT_RANGE_OPTIONS.fallback.minDb);
    });

    it("clips to the 2nd and 98th percentiles", () => {
        const values = Array.from({ length: 101 }, (_, i) => -80 + i * 0.5);
        const range = estimateRange(values);

        expect(range.minDb).toBe(-79);
        expect(range.maxDb).toBe(-31);
    });

    it("keeps a single loud transient from stretching the scale", () => {
        const values = [...new Array<number>(99).fill(-50), 0];
        const range = estimateRange(values);

        expect(range.minDb).toBe(-55);
        expect(range.maxDb).toBe(-45);
    });

    it("clamps values above the ceiling before clipping", () => {
        const range = estimateRange([20, 30], { ceiling: 10 });
        expect(range.minDb).toBe(5);
        expect(range.maxDb).toBe(15);
    });

    it("always spans at least minRange", () => {
        const batches: number[][] = [
            [-40],
            [-40, -39.5],
            [-70, -69, -68, -67],
            Array.from({ length: 40 }, (_, i) => -60 + (i % 7)),
        ];
        for (const batch of batches) {
            const range = estimateRange(batch, { minRange: 12 });
            expect(range.maxDb - range.minDb).toBeGreaterThanOrEqual(12);
        }
    });

    it("spans at least minRange for constant batches at non-integer levels", () => {
        const short: number[] = [];
        for (let i = 0; i < 20_000; i++) {
            const level = -80 + i * 0.0031;
            const range = estimateRange([level, level]);
            if (range.maxDb - range.minDb < DEFAULT_RANGE_OPTIONS.minRange) short.push(level);
        }
        expect(short).toEqual([]);

        const { minDb, maxDb } = widenToMinimum({ minDb: -59.5803, maxDb: -59.5803 }, 10);
        expect(maxDb - minDb).toBeGreaterThanOrEqual(10);
        expect(minDb).toBeCloseTo(-64.5803, 9);
        expect(maxDb).toBeCloseTo(-54.5803, 9);
    });

    it("does not shrink coverage when extreme values are added", () => {
        const base = Array.from({ length: 50 }, (_, i) => -60 + i * 0.5);
        const narrow = estimateRange(base);
        const wide = estimateRange([...base, -80, -20]);

        expect(narrow).toMatchObject({ minDb: -60, maxDb: -35.5 });
        expect(wide.minDb).toBeLessThanOrEqual(narrow.minDb);
        expect(wide.maxDb).toBeGreaterThanOrEqual(narrow.maxDb);
    });

    it("rejects invalid percentiles", () => {
        expect(() => estimateRange([-40], { loPercentile: 1.5 })).toThrow(/loPercentile/);
        expect(() => estimateRange([-40], { loPercentile: 0.9, hiPercentile: 0.1 })).toThrow(/must not exceed/);
    });

    it("widenToMinimum leaves wide ranges untouched", () => {
        expect(widenToMinimum({ minDb: -42, maxDb: -38 }, 10)).toEqual({ minDb: -45, maxDb: -35 });
        expect(widenToMinimum({ minDb: -70, maxDb: -30 }, 10)).toEqual({ minDb: -70, maxDb: -30 });
    });
});
