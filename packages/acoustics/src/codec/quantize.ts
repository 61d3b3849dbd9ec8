/**
 * 8-bit affine quantization of short-time power spectra.
 *
 * Each decibel value is clamped to `[dbFloor, dbCeil]` and mapped uniformly
 * onto `0..255`, one unsigned byte per time-frequency cell, row-major with
 * the snapshot index outermost.
 *
 * The mapping is lossy: one quantization step is `(dbCeil - dbFloor) / 255`
 * (about 0.39 dB with the defaults) and a round trip reproduces each
 * in-range value to within half a step. This is the storage format, not a
 * defect to be corrected downstream.
 *
 * Geometry (`snapshots`, `bins`) and the quantization range are not embedded
 * in the bytes; they travel alongside the payload.
 */

import type {
    DecodedSpectrogram,
    QuantizationRange,
    SpectrogramGeometry,
    SpectrogramIssue,
    SpectrogramMatrix,
} from "../types";

export const DEFAULT_QUANTIZATION: QuantizationRange = {
    dbFloor: -90,
    dbCeil: 10,
};

export const DEFAULT_GEOMETRY: SpectrogramGeometry = {
    snapshots: 10,
    bins: 256,
};

export const DEFAULT_SAMPLE_RATE = 48_000;

export type QuantizeOptions = Partial<QuantizationRange>;

export type DequantizeOptions = QuantizeOptions & {
    /** Round decoded values to this many decimals (display uses 1). */
    precision?: number;
};

function resolveRange(options: Partial<QuantizationRange>): QuantizationRange {
    const range = { ...DEFAULT_QUANTIZATION, ...options };
    if (!Number.isFinite(range.dbFloor) || !Number.isFinite(range.dbCeil)) {
        throw new Error("@noisescope/acoustics: quantization range must be finite");
    }
    if (range.dbCeil <= range.dbFloor) {
        throw new Error("@noisescope/acoustics: dbCeil must be greater than dbFloor");
    }
    return range;
}

export function assertGeometry(geometry: SpectrogramGeometry): void {
    const { snapshots, bins } = geometry;
    if (!Number.isInteger(snapshots) || snapshots <= 0 || !Number.isInteger(bins) || bins <= 0) {
        throw new Error(
            `@noisescope/acoustics: invalid spectrogram geometry ${snapshots}x${bins}`
        );
    }
}

/** Size of one quantization step in dB. */
export function quantizationStep(options: Partial<QuantizationRange> = {}): number {
    const { dbFloor, dbCeil } = resolveRange(options);
    return (dbCeil - dbFloor) / 255;
}

/** Quantize a single decibel value to a byte. Non-finite input maps to 0. */
export function quantizeValue(value: number, range: QuantizationRange): number {
    const { dbFloor, dbCeil } = range;
    if (!Number.isFinite(value)) return 0;
    const clamped = value < dbFloor ? dbFloor : value > dbCeil ? dbCeil : value;
    // Multiply before dividing so integer dB inputs land on exact halves.
    return Math.round(((clamped - dbFloor) * 255) / (dbCeil - dbFloor));
}

/** Inverse affine map of {@link quantizeValue}. */
export function dequantizeValue(byte: number, range: QuantizationRange): number {
    return range.dbFloor + (byte / 255) * (range.dbCeil - range.dbFloor);
}

/**
 * Encode an `S x B` decibel matrix to `S * B` bytes.
 *
 * All snapshots must have the same number of bins.
 */
export function quantize(
    matrix: SpectrogramMatrix,
    options: QuantizeOptions = {}
): Uint8Array {
    const range = resolveRange(options);
    const snapshots = matrix.length;
    const bins = matrix[0]?.length ?? 0;

    const out = new Uint8Array(snapshots * bins);
    for (let s = 0; s < snapshots; s++) {
        const row = matrix[s];
        if (!row || row.length !== bins) {
            throw new Error(
                `@noisescope/acoustics: snapshot ${s} has ${row?.length ?? 0} bins, expected ${bins}`
            );
        }
        const offset = s * bins;
        for (let b = 0; b < bins; b++) {
            out[offset + b] = quantizeValue(row[b] ?? Number.NaN, range);
        }
    }
    return out;
}

/**
 * Decode `S * B` bytes back to decibels.
 *
 * A buffer shorter than the declared geometry does not throw: the missing
 * cells are filled with `dbFloor` and a `corrupt-spectrogram` issue is
 * reported. Extra trailing bytes are ignored and reported as
 * `trailing-bytes`.
 */
export function dequantize(
    bytes: Uint8Array,
    geometry: SpectrogramGeometry,
    options: DequantizeOptions = {}
): DecodedSpectrogram {
    assertGeometry(geometry);
    const range = resolveRange(options);
    const { snapshots, bins } = geometry;
    const expected = snapshots * bins;
    const issues: SpectrogramIssue[] = [];

    if (bytes.length < expected) {
        issues.push({ kind: "corrupt-spectrogram", expected, actual: bytes.length });
        console.warn(
            `@noisescope/acoustics: spectrogram payload has ${bytes.length} bytes, expected ${expected}; filling with floor`
        );
    } else if (bytes.length > expected) {
        issues.push({ kind: "trailing-bytes", expected, actual: bytes.length });
        console.warn(
            `@noisescope/acoustics: ignoring ${bytes.length - expected} trailing spectrogram bytes`
        );
    }

    const scale = options.precision !== undefined ? 10 ** options.precision : 0;

    const data: Float32Array[] = new Array(snapshots);
    for (let s = 0; s < snapshots; s++) {
        const row = new Float32Array(bins);
        const offset = s * bins;
        for (let b = 0; b < bins; b++) {
            const byte = bytes[offset + b];
            if (byte === undefined) {
                row[b] = range.dbFloor;
                continue;
            }
            const db = dequantizeValue(byte, range);
            row[b] = scale > 0 ? Math.round(db * scale) / scale : db;
        }
        data[s] = row;
    }

    return { geometry: { snapshots, bins }, data, issues };
}

/**
 * Frequency label (Hz) of each bin, assuming bins span `0..sampleRate/2`.
 */
export function binFrequencies(bins: number, sampleRate: number = DEFAULT_SAMPLE_RATE): number[] {
    const out: number[] = new Array(bins);
    const nyquist = sampleRate / 2;
    for (let i = 0; i < bins; i++) {
        out[i] = Math.round((i * nyquist) / bins);
    }
    return out;
}
