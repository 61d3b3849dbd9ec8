/**
 * zlib (RFC 1950) envelope around quantized spectrogram bytes.
 *
 * The capture side may or may not compress a payload, and nothing in the
 * stored blob says which. Decoding therefore always tries to inflate first
 * and falls back to treating the payload as raw bytes.
 */

import { unzlibSync, zlibSync, type DeflateOptions } from "fflate";

import type { SpectrogramIssue } from "../types";

export type CompressionLevel = NonNullable<DeflateOptions["level"]>;

export type DecompressResult = {
    bytes: Uint8Array;
    /** True when the payload was a valid zlib stream. */
    compressed: boolean;
    /** Set when inflating failed and the payload was used as-is. */
    issue?: SpectrogramIssue;
};

export function compressSpectrogram(bytes: Uint8Array, level: CompressionLevel = 6): Uint8Array {
    return zlibSync(bytes, { level });
}

/**
 * Inflate a payload, or return it unchanged when it is not a zlib stream.
 *
 * `expectedLength`, when given, resolves the rare case where raw bytes
 * happen to parse as a zlib header: if inflating yields fewer bytes than
 * expected while the payload itself is long enough, the payload is raw.
 */
export function decompressSpectrogram(payload: Uint8Array, expectedLength?: number): DecompressResult {
    let inflated: Uint8Array;
    try {
        inflated = unzlibSync(payload);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.debug(`@noisescope/acoustics: spectrogram payload is not zlib (${message}); using raw bytes`);
        return {
            bytes: payload,
            compressed: false,
            issue: { kind: "decompression-failure", message },
        };
    }

    if (
        expectedLength !== undefined &&
        inflated.length < expectedLength &&
        payload.length >= expectedLength
    ) {
        const message = `inflated ${inflated.length} bytes, expected ${expectedLength}`;
        console.warn(`@noisescope/acoustics: spectrogram payload looks raw (${message}); using raw bytes`);
        return {
            bytes: payload,
            compressed: false,
            issue: { kind: "decompression-failure", message },
        };
    }

    return { bytes: inflated, compressed: true };
}
