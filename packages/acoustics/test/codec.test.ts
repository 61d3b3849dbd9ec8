import { afterEach, describe, expect, it, vi } from "vitest";

import {
    binFrequencies,
    compressSpectrogram,
    decodeSpectrogramBlob,
    decompressSpectrogram,
    dequantize,
    encodeSpectrogramBlob,
    quantizationStep,
    quantize,
} from "../src/index";

const SCENARIO = [
    [-90, -45, 0, 10],
    [-90, -89, -60, -30],
];

// Float32 storage adds a little on top of the half-step bound.
const FLOAT32_SLACK = 1e-4;

describe("quantization codec", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("encodes the reference matrix to the expected bytes", () => {
        const bytes = quantize(SCENARIO);
        expect(Array.from(bytes)).toEqual([0, 115, 230, 255, 0, 3, 77, 153]);
    });

    it("decodes within half a quantization step of the input", () => {
        const bytes = quantize(SCENARIO);
        const decoded = dequantize(bytes, { snapshots: 2, bins: 4 });
        const bound = quantizationStep() / 2 + FLOAT32_SLACK;

        expect(decoded.issues).toEqual([]);
        SCENARIO.forEach((row, s) => {
            row.forEach((value, b) => {
                expect(Math.abs((decoded.data[s]?.[b] ?? Infinity) - value)).toBeLessThanOrEqual(bound);
            });
        });
    });

    it("holds the round-trip bound across the whole range", () => {
        const row: number[] = [];
        for (let v = -90; v <= 10; v += 0.37) row.push(v);
        const decoded = dequantize(quantize([row]), { snapshots: 1, bins: row.length });
        const bound = quantizationStep() / 2 + FLOAT32_SLACK;

        row.forEach((value, b) => {
            expect(Math.abs((decoded.data[0]?.[b] ?? Infinity) - value)).toBeLessThanOrEqual(bound);
        });
    });

    it("clamps out-of-range values to the floor and ceiling bytes", () => {
        expect(Array.from(quantize([[-120, 50]]))).toEqual(Array.from(quantize([[-90, 10]])));
        expect(Array.from(quantize([[-120, 50]]))).toEqual([0, 255]);
    });

    it("honours a custom quantization range", () => {
        expect(Array.from(quantize([[-60, -10, 40]], { dbFloor: -60, dbCeil: 40 }))).toEqual([0, 128, 255]);
        expect(quantizationStep({ dbFloor: -60, dbCeil: 40 })).toBeCloseTo(100 / 255, 10);
    });

    it("rejects ragged matrices and invalid ranges", () => {
        expect(() => quantize([[1, 2], [3]])).toThrow(/snapshot 1 has 1 bins, expected 2/);
        expect(() => quantize([[0]], { dbFloor: 10, dbCeil: 10 })).toThrow(/dbCeil must be greater/);
        expect(() => dequantize(new Uint8Array(4), { snapshots: 0, bins: 4 })).toThrow(/invalid spectrogram geometry/);
    });

    it("fills a short buffer with the floor and reports it", () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
        const decoded = dequantize(new Uint8Array([255, 255, 255]), { snapshots: 2, bins: 2 });

        expect(decoded.data[0]?.[0]).toBeCloseTo(10, 4);
        expect(decoded.data[1]?.[0]).toBeCloseTo(10, 4);
        expect(decoded.data[1]?.[1]).toBe(-90);
        expect(decoded.issues).toEqual([{ kind: "corrupt-spectrogram", expected: 4, actual: 3 }]);
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it("ignores trailing bytes and reports them", () => {
        vi.spyOn(console, "warn").mockImplementation(() => {});
        const decoded = dequantize(new Uint8Array([0, 0, 0, 0, 255]), { snapshots: 2, bins: 2 });

        expect(decoded.data).toHaveLength(2);
        expect(Array.from(decoded.data[1] ?? [])).toEqual([-90, -90]);
        expect(decoded.issues).toEqual([{ kind: "trailing-bytes", expected: 4, actual: 5 }]);
    });

    it("rounds decoded values when a precision is given", () => {
        const decoded = dequantize(new Uint8Array([115]), { snapshots: 1, bins: 1 }, { precision: 1 });
        expect(decoded.data[0]?.[0]).toBeCloseTo(-44.9, 4);
    });

    it("labels bins across 0..nyquist", () => {
        expect(binFrequencies(4, 48000)).toEqual([0, 6000, 12000, 18000]);
        expect(binFrequencies(256)[1]).toBe(94);
    });
});

describe("compression envelope", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("inflates what it deflates", () => {
        const bytes = quantize(SCENARIO);
        const result = decompressSpectrogram(compressSpectrogram(bytes));

        expect(result.compressed).toBe(true);
        expect(result.issue).toBeUndefined();
        expect(Array.from(result.bytes)).toEqual(Array.from(bytes));
    });

    it("passes raw payloads through unchanged", () => {
        vi.spyOn(console, "debug").mockImplementation(() => {});
        const raw = new Uint8Array([0, 115, 230, 255]);
        const result = decompressSpectrogram(raw);

        expect(result.compressed).toBe(false);
        expect(result.bytes).toBe(raw);
        expect(result.issue?.kind).toBe("decompression-failure");
    });
});

describe("spectrogram blobs", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("decodes a compressed blob for display at 0.1 dB", () => {
        const { blob, geometry } = encodeSpectrogramBlob(SCENARIO);
        expect(geometry).toEqual({ snapshots: 2, bins: 4 });

        const decoded = decodeSpectrogramBlob(blob, geometry);
        expect(decoded?.issues).toEqual([]);

        const first = Array.from(decoded?.data[0] ?? []);
        const second = Array.from(decoded?.data[1] ?? []);
        [-90, -44.9, 0.2, 10].forEach((v, i) => expect(first[i]).toBeCloseTo(v, 4));
        [-90, -88.8, -59.8, -30].forEach((v, i) => expect(second[i]).toBeCloseTo(v, 4));
    });

    it("decodes an uncompressed blob the same way", () => {
        vi.spyOn(console, "debug").mockImplementation(() => {});
        const { blob, geometry } = encodeSpectrogramBlob(SCENARIO, { compression: false });
        expect(Array.from(blob)).toEqual([0, 115, 230, 255, 0, 3, 77, 153]);

        const decoded = decodeSpectrogramBlob(blob, geometry);
        expect(decoded?.data[0]?.[1]).toBeCloseTo(-44.9, 4);
        expect(decoded?.data[1]?.[3]).toBeCloseTo(-30, 4);
        expect(decoded?.issues.map((issue) => issue.kind)).toEqual(["decompression-failure"]);
    });

    it("reports a zlib payload that inflates short as raw bytes", () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
        const blob = compressSpectrogram(new Uint8Array([1, 2]));

        const decoded = decodeSpectrogramBlob(blob, { snapshots: 2, bins: 4 });

        expect(decoded?.issues[0]).toEqual({ kind: "decompression-failure", message: "inflated 2 bytes, expected 8" });
        expect(decoded?.issues[1]?.kind).toBe("trailing-bytes");
        expect(warn).toHaveBeenCalledWith(
            "@noisescope/acoustics: spectrogram payload looks raw (inflated 2 bytes, expected 8); using raw bytes"
        );
    });

    it("treats an absent or empty blob as no spectrogram", () => {
        expect(decodeSpectrogramBlob(null, { snapshots: 2, bins: 4 })).toBeNull();
        expect(decodeSpectrogramBlob(new Uint8Array(0), { snapshots: 2, bins: 4 })).toBeNull();
    });
});
