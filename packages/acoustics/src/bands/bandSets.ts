/**
 * Historical frequency band layouts.
 *
 * Three schema generations exist in stored data. Each is modelled as its own
 * tagged variant carrying an ordered band list. Lists are in display order:
 * highest band first, lowest band last, so that a heatmap drawn top-down
 * puts low frequencies at the bottom.
 *
 * A batch uses exactly one band set, chosen once by {@link detectBandSet}.
 */

import type { RawMeasurementRow } from "../types";

export type BandDefinition = {
    label: string;
    key: string;
    lowHz: number;
    highHz: number;
};

export type BandSetKind = "three-band" | "seven-band" | "eight-band";

type BandSetOf<K extends BandSetKind> = {
    kind: K;
    /** Row key whose presence selects this set. */
    probeKey: string | null;
    bands: readonly BandDefinition[];
};

export type ThreeBandSet = BandSetOf<"three-band">;
export type SevenBandSet = BandSetOf<"seven-band">;
export type EightBandSet = BandSetOf<"eight-band">;

export type BandSet = ThreeBandSet | SevenBandSet | EightBandSet;

export const EIGHT_BAND: EightBandSet = {
    kind: "eight-band",
    probeKey: "band_0_100",
    bands: [
        { label: "12k+", key: "band_12k_24k", lowHz: 12000, highHz: 24000 },
        { label: "6-12k", key: "band_6k_12k", lowHz: 6000, highHz: 12000 },
        { label: "3-6k", key: "band_3k_6k", lowHz: 3000, highHz: 6000 },
        { label: "1.5-3k", key: "band_1500_3k", lowHz: 1500, highHz: 3000 },
        { label: "800-1.5k", key: "band_800_1500", lowHz: 800, highHz: 1500 },
        { label: "300-800", key: "band_300_800", lowHz: 300, highHz: 800 },
        { label: "100-300", key: "band_100_300", lowHz: 100, highHz: 300 },
        { label: "0-100", key: "band_0_100", lowHz: 0, highHz: 100 },
    ],
};

export const SEVEN_BAND: SevenBandSet = {
    kind: "seven-band",
    probeKey: "band_0_200",
    bands: [
        { label: "8k+", key: "band_8k_24k", lowHz: 8000, highHz: 24000 },
        { label: "4-8k", key: "band_4k_8k", lowHz: 4000, highHz: 8000 },
        { label: "2-4k", key: "band_2k_4k", lowHz: 2000, highHz: 4000 },
        { label: "1-2k", key: "band_1k_2k", lowHz: 1000, highHz: 2000 },
        { label: ".5-1k", key: "band_500_1k", lowHz: 500, highHz: 1000 },
        { label: "200-500", key: "band_200_500", lowHz: 200, highHz: 500 },
        { label: "0-200", key: "band_0_200", lowHz: 0, highHz: 200 },
    ],
};

export const THREE_BAND: ThreeBandSet = {
    kind: "three-band",
    probeKey: null,
    bands: [
        { label: "High", key: "band_high_db", lowHz: 4000, highHz: 24000 },
        { label: "Mid", key: "band_mid_db", lowHz: 500, highHz: 4000 },
        { label: "Low", key: "band_low_db", lowHz: 0, highHz: 500 },
    ],
};

/** Finest first: detection probes in this order. */
export const BAND_SETS: readonly BandSet[] = [EIGHT_BAND, SEVEN_BAND, THREE_BAND];

export function bandKeys(bandSet: BandSet): string[] {
    return bandSet.bands.map((b) => b.key);
}

/** Bands in ascending frequency order (lowest first). */
export function ascendingBands(bandSet: BandSet): BandDefinition[] {
    return [...bandSet.bands].reverse();
}

/**
 * Pick the band set for a whole batch by probing its first row.
 *
 * `isPresent` decides whether a probed value counts as exposed; the adapter
 * passes its parse-or-absent rule so that a null or garbage value does not
 * select a finer set.
 */
export function detectBandSet(
    firstRow: RawMeasurementRow | undefined,
    isPresent: (value: unknown) => boolean
): BandSet {
    if (!firstRow) return THREE_BAND;
    for (const set of BAND_SETS) {
        if (set.probeKey === null) return set;
        if (isPresent(firstRow[set.probeKey])) return set;
    }
    return THREE_BAND;
}
