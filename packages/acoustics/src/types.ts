/**
 * Decibel value. `null` means the field is absent (not measured, unparsable,
 * or out of domain). Never substitute a sentinel number for a missing level.
 */
export type Db = number | null;

/** Spectrogram shape conventions: 2D arrays are `[snapshot][bin]`. */
export type SpectrogramMatrix = ArrayLike<ArrayLike<number>>;

export type SpectrogramGeometry = {
    /** Number of spectrum snapshots (S). */
    snapshots: number;
    /** Number of frequency bins per snapshot (B). */
    bins: number;
};

export type QuantizationRange = {
    /** Value mapped to byte 0. */
    dbFloor: number;
    /** Value mapped to byte 255. */
    dbCeil: number;
};

export type SpectrogramIssue =
    | { kind: "corrupt-spectrogram"; expected: number; actual: number }
    | { kind: "trailing-bytes"; expected: number; actual: number }
    | { kind: "decompression-failure"; message: string };

export type DecodedSpectrogram = {
    geometry: SpectrogramGeometry;
    /** Decibel values, `[snapshot][bin]`, bin 0 = lowest frequency. */
    data: Float32Array[];
    /** Conditions recovered while decoding. Empty when the payload was intact. */
    issues: SpectrogramIssue[];
};

export type LevelStatistics = {
    mean: Db;
    max: Db;
    min: Db;
    l10: Db;
    l50: Db;
    l90: Db;
};

/**
 * One sample interval in canonical form.
 *
 * `bands` holds exactly the keys of the batch's active band set.
 */
export type Measurement = {
    id: string;
    /** Epoch milliseconds. */
    timestamp: number;
    levels: LevelStatistics;
    bands: Record<string, Db>;
    spectralCentroid: number | null;
    spectralFlatness: number | null;
    dominantFrequency: number | null;
    /** 0-100. */
    silencePercent: number | null;
    /** Non-negative; `null` when unscored. */
    anomalyScore: number | null;
    annotation: string | null;
    spectrogram: DecodedSpectrogram | null;
};

/** Row as returned by the measurement store, before normalization. */
export type RawMeasurementRow = Record<string, unknown>;

export type RowOrder = "oldest-first" | "newest-first";

export type TimeWindow = {
    /** Epoch milliseconds, inclusive. */
    start: number;
    /** Epoch milliseconds, inclusive. */
    end: number;
};

export type DisplayRange = {
    minDb: number;
    maxDb: number;
};
