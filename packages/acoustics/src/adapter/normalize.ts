/**
 * Measurement adapter.
 *
 * Turns store rows of any historical shape into canonical {@link Measurement}
 * values. The band set is decided once per batch, from the first row, and
 * applied to every row; rows are never re-probed individually.
 *
 * Row order is preserved. Callers state the order they rely on (heatmaps
 * render oldest-first, "recent" tables newest-first).
 */

import { z } from "zod";

import { bandKeys, detectBandSet, type BandSet } from "../bands/bandSets";
import { decodeSpectrogramBlob } from "../codec/blob";
import { DEFAULT_GEOMETRY, DEFAULT_QUANTIZATION } from "../codec/quantize";
import type {
    DecodedSpectrogram,
    Measurement,
    QuantizationRange,
    RawMeasurementRow,
    SpectrogramGeometry,
    SpectrogramIssue,
} from "../types";
import { downsampleUniform } from "./downsample";
import {
    dbSchema,
    nonNegativeSchema,
    parseAnnotation,
    parseId,
    parseOrAbsent,
    parseTimestamp,
    percentSchema,
    pickNumber,
} from "./fields";

export type NormalizeOptions = {
    /** Apply uniform-stride downsampling to at most this many rows. */
    maxPoints?: number;
    quantization?: Partial<QuantizationRange>;
    /** Geometry assumed when a row carries a blob without geometry fields. */
    geometry?: SpectrogramGeometry;
};

export type NormalizedBatch = {
    bandSet: BandSet;
    rows: Measurement[];
    /** Downsampling stride applied (1 = none). */
    stride: number;
    /** Raw row count before downsampling. */
    total: number;
    /** Rows discarded for lack of an id or timestamp. */
    dropped: number;
};

const LEVEL_ALIASES = {
    mean: ["mean_db", "laeq"],
    max: ["max_db", "lmax"],
    min: ["min_db", "lmin"],
    l10: ["l10_db", "l10"],
    l50: ["l50_db", "l50"],
    l90: ["l90_db", "l90"],
} as const;

const positiveInt = z.coerce.number().int().positive();

const decodedRowsSchema = z.array(z.array(z.number().nullable()));

function isPresentDb(value: unknown): boolean {
    return parseOrAbsent(value, dbSchema) !== null;
}

function rowGeometry(raw: RawMeasurementRow, fallback: SpectrogramGeometry): SpectrogramGeometry {
    const snapshots = positiveInt.safeParse(raw["spectrogram_snapshots"]);
    const bins = positiveInt.safeParse(raw["spectrogram_bins"]);
    return {
        snapshots: snapshots.success ? snapshots.data : fallback.snapshots,
        bins: bins.success ? bins.data : fallback.bins,
    };
}

function fromDecodedRows(rows: (number | null)[][], dbFloor: number): DecodedSpectrogram | null {
    if (rows.length === 0) return null;
    const bins = rows.reduce((max, row) => Math.max(max, row.length), 0);
    if (bins === 0) return null;

    const issues: SpectrogramIssue[] = [];
    const actual = rows.reduce((sum, row) => sum + row.length, 0);
    if (actual < rows.length * bins) {
        issues.push({ kind: "corrupt-spectrogram", expected: rows.length * bins, actual });
    }

    const data = rows.map((row) => {
        const out = new Float32Array(bins).fill(dbFloor);
        for (let b = 0; b < row.length; b++) {
            const v = row[b];
            if (v !== null && v !== undefined && Number.isFinite(v)) out[b] = v;
        }
        return out;
    });

    return { geometry: { snapshots: rows.length, bins }, data, issues };
}

function parseSpectrogram(raw: RawMeasurementRow, options: NormalizeOptions): DecodedSpectrogram | null {
    const payload = raw["spectrogram"];
    if (payload === null || payload === undefined) return null;

    const quantization = { ...DEFAULT_QUANTIZATION, ...options.quantization };
    const geometry = rowGeometry(raw, options.geometry ?? DEFAULT_GEOMETRY);

    if (payload instanceof Uint8Array) {
        return decodeSpectrogramBlob(payload, geometry, quantization);
    }
    if (payload instanceof ArrayBuffer) {
        return decodeSpectrogramBlob(new Uint8Array(payload), geometry, quantization);
    }

    const decoded = decodedRowsSchema.safeParse(payload);
    if (decoded.success) {
        return fromDecodedRows(decoded.data, quantization.dbFloor);
    }

    console.warn("@noisescope/acoustics: unrecognised spectrogram payload; treating row as having no spectrogram");
    return null;
}

/**
 * Coerce one raw row against an already-chosen band set.
 *
 * Returns `null` when the row has no usable id or timestamp.
 */
export function normalizeRow(
    raw: RawMeasurementRow,
    bandSet: BandSet,
    options: NormalizeOptions = {}
): Measurement | null {
    const id = parseId(raw["id"]);
    const timestamp = parseTimestamp(raw["unix_time"] ?? raw["timestamp"]);
    if (id === null || timestamp === null) return null;

    const bands: Record<string, number | null> = {};
    for (const key of bandKeys(bandSet)) {
        bands[key] = parseOrAbsent(raw[key], dbSchema);
    }

    return {
        id,
        timestamp,
        levels: {
            mean: pickNumber(raw, LEVEL_ALIASES.mean),
            max: pickNumber(raw, LEVEL_ALIASES.max),
            min: pickNumber(raw, LEVEL_ALIASES.min),
            l10: pickNumber(raw, LEVEL_ALIASES.l10),
            l50: pickNumber(raw, LEVEL_ALIASES.l50),
            l90: pickNumber(raw, LEVEL_ALIASES.l90),
        },
        bands,
        spectralCentroid: pickNumber(raw, ["spectral_centroid"], nonNegativeSchema),
        spectralFlatness: pickNumber(raw, ["spectral_flatness"], nonNegativeSchema),
        dominantFrequency: pickNumber(raw, ["dominant_freq", "dominant_frequency"], nonNegativeSchema),
        silencePercent: pickNumber(raw, ["silence_pct", "silence_percent"], percentSchema),
        anomalyScore: pickNumber(raw, ["anomaly_score"], nonNegativeSchema),
        annotation: parseAnnotation(raw["annotation"]),
        spectrogram: parseSpectrogram(raw, options),
    };
}

/**
 * Normalize a batch of store rows.
 *
 * Downsampling (when `maxPoints` is set) runs on the raw rows before
 * coercion so that skipped rows are never decoded.
 */
export function normalize(rawRows: readonly RawMeasurementRow[], options: NormalizeOptions = {}): NormalizedBatch {
    const bandSet = detectBandSet(rawRows[0], isPresentDb);

    const sampled =
        options.maxPoints !== undefined
            ? downsampleUniform(rawRows, options.maxPoints)
            : { rows: [...rawRows], stride: 1, total: rawRows.length };

    const rows: Measurement[] = [];
    let dropped = 0;
    for (const raw of sampled.rows) {
        const row = normalizeRow(raw, bandSet, options);
        if (row) rows.push(row);
        else dropped++;
    }

    if (dropped > 0) {
        console.warn(`@noisescope/acoustics: dropped ${dropped} row(s) without a usable id or timestamp`);
    }

    return { bandSet, rows, stride: sampled.stride, total: sampled.total, dropped };
}
