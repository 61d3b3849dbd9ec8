import type {
    DecodedSpectrogram,
    QuantizationRange,
    SpectrogramGeometry,
    SpectrogramMatrix,
} from "../types";
import { compressSpectrogram, decompressSpectrogram, type CompressionLevel } from "./envelope";
import { assertGeometry, dequantize, quantize } from "./quantize";

export type EncodeBlobOptions = Partial<QuantizationRange> & {
    /** zlib level, or `false` to store raw bytes. Default 6. */
    compression?: CompressionLevel | false;
};

export type EncodedSpectrogram = {
    blob: Uint8Array;
    geometry: SpectrogramGeometry;
};

/** Quantize and (optionally) compress a matrix for storage. */
export function encodeSpectrogramBlob(
    matrix: SpectrogramMatrix,
    options: EncodeBlobOptions = {}
): EncodedSpectrogram {
    const geometry: SpectrogramGeometry = {
        snapshots: matrix.length,
        bins: matrix[0]?.length ?? 0,
    };
    assertGeometry(geometry);

    const bytes = quantize(matrix, options);
    const compression = options.compression ?? 6;
    const blob = compression === false ? bytes : compressSpectrogram(bytes, compression);
    return { blob, geometry };
}

/**
 * Decode a stored blob for display (values rounded to 0.1 dB).
 *
 * Returns `null` for an absent or empty payload so that a missing
 * spectrogram degrades to "no spectrogram" for that row only. A payload
 * that could not be inflated is reported in `issues` ahead of any
 * length problems.
 */
export function decodeSpectrogramBlob(
    blob: Uint8Array | null | undefined,
    geometry: SpectrogramGeometry,
    options: Partial<QuantizationRange> = {}
): DecodedSpectrogram | null {
    if (!blob || blob.length === 0) return null;
    assertGeometry(geometry);

    const expected = geometry.snapshots * geometry.bins;
    const { bytes, issue } = decompressSpectrogram(blob, expected);
    const decoded = dequantize(bytes, geometry, { ...options, precision: 1 });
    if (issue) decoded.issues.unshift(issue);
    return decoded;
}
