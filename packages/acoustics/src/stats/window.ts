/**
 * Aggregate statistics over a window of measurements: headline summary,
 * hourly buckets for the hourly chart, and a day-of-week x hour profile.
 */

import type { Measurement } from "../types";
import { meanOf } from "../util/stats";

export const DEFAULT_ANOMALY_THRESHOLD = 2.0;
export const HIGH_ANOMALY_SCORE = 3.0;

const HOUR_MS = 3_600_000;

export type AnomalyClass = "none" | "anomaly" | "high";

export function classifyAnomaly(
    score: number | null,
    threshold: number = DEFAULT_ANOMALY_THRESHOLD
): AnomalyClass {
    if (score === null || !(score > threshold)) return "none";
    return score > HIGH_ANOMALY_SCORE ? "high" : "anomaly";
}

export type WindowSummary = {
    count: number;
    meanLevel: number | null;
    maxLevel: number | null;
    minLevel: number | null;
    meanL50: number | null;
    meanCentroid: number | null;
    meanFlatness: number | null;
    anomalyCount: number;
};

export type StatsOptions = {
    anomalyThreshold?: number;
};

function maxOf(values: Iterable<number | null>): number | null {
    let out: number | null = null;
    for (const v of values) if (v !== null && (out === null || v > out)) out = v;
    return out;
}

function minOf(values: Iterable<number | null>): number | null {
    let out: number | null = null;
    for (const v of values) if (v !== null && (out === null || v < out)) out = v;
    return out;
}

function countAnomalies(rows: readonly Measurement[], threshold: number): number {
    return rows.filter((r) => r.anomalyScore !== null && r.anomalyScore > threshold).length;
}

export function summarizeWindow(rows: readonly Measurement[], options: StatsOptions = {}): WindowSummary {
    const threshold = options.anomalyThreshold ?? DEFAULT_ANOMALY_THRESHOLD;
    return {
        count: rows.length,
        meanLevel: meanOf(rows.map((r) => r.levels.mean)),
        maxLevel: maxOf(rows.map((r) => r.levels.max)),
        minLevel: minOf(rows.map((r) => r.levels.min)),
        meanL50: meanOf(rows.map((r) => r.levels.l50)),
        meanCentroid: meanOf(rows.map((r) => r.spectralCentroid)),
        meanFlatness: meanOf(rows.map((r) => r.spectralFlatness)),
        anomalyCount: countAnomalies(rows, threshold),
    };
}

export type HourlyAggregate = {
    /** Epoch ms at the start of the hour (UTC). */
    hourStart: number;
    count: number;
    meanLevel: number | null;
    maxLevel: number | null;
    minLevel: number | null;
    meanL50: number | null;
    anomalyCount: number;
};

/** Bucket rows by UTC hour, ascending. Input order does not matter. */
export function hourlyAggregates(rows: readonly Measurement[], options: StatsOptions = {}): HourlyAggregate[] {
    const threshold = options.anomalyThreshold ?? DEFAULT_ANOMALY_THRESHOLD;
    const buckets = new Map<number, Measurement[]>();

    for (const row of rows) {
        const hourStart = Math.floor(row.timestamp / HOUR_MS) * HOUR_MS;
        const bucket = buckets.get(hourStart);
        if (bucket) bucket.push(row);
        else buckets.set(hourStart, [row]);
    }

    return [...buckets.entries()]
        .sort(([a], [b]) => a - b)
        .map(([hourStart, bucket]) => ({
            hourStart,
            count: bucket.length,
            meanLevel: meanOf(bucket.map((r) => r.levels.mean)),
            maxLevel: maxOf(bucket.map((r) => r.levels.max)),
            minLevel: minOf(bucket.map((r) => r.levels.min)),
            meanL50: meanOf(bucket.map((r) => r.levels.l50)),
            anomalyCount: countAnomalies(bucket, threshold),
        }));
}

/** `[dayOfWeek][hour]` mean level, Sunday = 0, UTC. `null` where empty. */
export type WeeklyProfile = (number | null)[][];

export function weeklyProfile(rows: readonly Measurement[]): WeeklyProfile {
    const sums = Array.from({ length: 7 }, () => new Float64Array(24));
    const counts = Array.from({ length: 7 }, () => new Uint32Array(24));

    for (const row of rows) {
        const level = row.levels.mean;
        if (level === null) continue;
        const date = new Date(row.timestamp);
        const day = date.getUTCDay();
        const hour = date.getUTCHours();
        const daySums = sums[day];
        const dayCounts = counts[day];
        if (!daySums || !dayCounts) continue;
        daySums[hour] = (daySums[hour] ?? 0) + level;
        dayCounts[hour] = (dayCounts[hour] ?? 0) + 1;
    }

    return sums.map((daySums, day) =>
        Array.from(daySums, (sum, hour) => {
            const n = counts[day]?.[hour] ?? 0;
            return n > 0 ? sum / n : null;
        })
    );
}
