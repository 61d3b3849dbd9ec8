/**
 * Band aggregation for compact (table / row) display.
 *
 * By default band levels are averaged directly in dB. That is an
 * approximation: the energy-correct mean converts to linear power first.
 * The dB-domain mean is kept as the default so displayed values match
 * historical ones; `averaging: "power"` opts into the linear-power mean.
 */

import type { Db, Measurement } from "../types";
import type { BandSet } from "./bandSets";

export type BandAveraging = "decibel" | "power";

export type AggregateOptions = {
    averaging?: BandAveraging;
};

export type BandSummary = {
    low: Db;
    mid: Db;
    high: Db;
};

/** Fine band keys rolled up into each summary band, per band set. */
export const SUMMARY_GROUPS: Record<BandSet["kind"], Record<keyof BandSummary, readonly string[]>> = {
    "eight-band": {
        low: ["band_0_100", "band_100_300"],
        mid: ["band_300_800", "band_800_1500", "band_1500_3k"],
        high: ["band_3k_6k", "band_6k_12k", "band_12k_24k"],
    },
    "seven-band": {
        low: ["band_0_200", "band_200_500"],
        mid: ["band_500_1k", "band_1k_2k", "band_2k_4k"],
        high: ["band_4k_8k", "band_8k_24k"],
    },
    "three-band": {
        low: ["band_low_db"],
        mid: ["band_mid_db"],
        high: ["band_high_db"],
    },
};

/**
 * Mean level of the given sibling bands.
 *
 * Absent constituents are skipped; the result is absent only when every
 * constituent is.
 */
export function aggregate(
    bands: Readonly<Record<string, Db>>,
    keys: readonly string[],
    options: AggregateOptions = {}
): Db {
    const averaging = options.averaging ?? "decibel";
    let sum = 0;
    let count = 0;

    for (const key of keys) {
        const v = bands[key];
        if (v === null || v === undefined || !Number.isFinite(v)) continue;
        sum += averaging === "power" ? 10 ** (v / 10) : v;
        count++;
    }

    if (count === 0) return null;
    const mean = sum / count;
    return averaging === "power" ? 10 * Math.log10(mean) : mean;
}

/** Collapse a measurement's bands to low / mid / high. */
export function summarizeBands(
    measurement: Pick<Measurement, "bands">,
    bandSet: BandSet,
    options: AggregateOptions = {}
): BandSummary {
    const groups = SUMMARY_GROUPS[bandSet.kind];
    return {
        low: aggregate(measurement.bands, groups.low, options),
        mid: aggregate(measurement.bands, groups.mid, options),
        high: aggregate(measurement.bands, groups.high, options),
    };
}
