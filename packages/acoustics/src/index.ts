export type AcousticsVersion = "0.1.0";

export const ACOUSTICS_VERSION: AcousticsVersion = "0.1.0";

// ----------------------------
// Core Types
// ----------------------------

export type {
  Db,
  SpectrogramMatrix,
  SpectrogramGeometry,
  QuantizationRange,
  SpectrogramIssue,
  DecodedSpectrogram,
  LevelStatistics,
  Measurement,
  RawMeasurementRow,
  RowOrder,
  TimeWindow,
  DisplayRange
} from "./types";

// ----------------------------
// Quantization codec + compression envelope
// ----------------------------

export type { DequantizeOptions, QuantizeOptions } from "./codec/quantize";
export {
  DEFAULT_QUANTIZATION,
  DEFAULT_GEOMETRY,
  DEFAULT_SAMPLE_RATE,
  assertGeometry,
  quantizationStep,
  quantizeValue,
  dequantizeValue,
  quantize,
  dequantize,
  binFrequencies
} from "./codec/quantize";

export type { CompressionLevel, DecompressResult } from "./codec/envelope";
export { compressSpectrogram, decompressSpectrogram } from "./codec/envelope";

export type { EncodeBlobOptions, EncodedSpectrogram } from "./codec/blob";
export { encodeSpectrogramBlob, decodeSpectrogramBlob } from "./codec/blob";

// ----------------------------
// Band sets + aggregation
// ----------------------------

export type { BandDefinition, BandSet, BandSetKind } from "./bands/bandSets";
export { EIGHT_BAND, SEVEN_BAND, THREE_BAND, BAND_SETS, bandKeys, ascendingBands, detectBandSet } from "./bands/bandSets";

export type { BandAveraging, AggregateOptions, BandSummary } from "./bands/aggregate";
export { SUMMARY_GROUPS, aggregate, summarizeBands } from "./bands/aggregate";

// ----------------------------
// Measurement adapter
// ----------------------------

export { parseOrAbsent, pickNumber, parseTimestamp } from "./adapter/fields";
export type { DownsampleResult } from "./adapter/downsample";
export { DEFAULT_MAX_POINTS, downsampleUniform } from "./adapter/downsample";
export type { NormalizeOptions, NormalizedBatch } from "./adapter/normalize";
export { normalize, normalizeRow } from "./adapter/normalize";

// ----------------------------
// Adaptive range
// ----------------------------

export type { RangeOptions, RangeEstimate } from "./range/adaptiveRange";
export { DEFAULT_RANGE_OPTIONS, estimateRange, widenToMinimum } from "./range/adaptiveRange";

// ----------------------------
// Window statistics
// ----------------------------

export type { AnomalyClass, WindowSummary, StatsOptions, HourlyAggregate, WeeklyProfile } from "./stats/window";
export {
  DEFAULT_ANOMALY_THRESHOLD,
  HIGH_ANOMALY_SCORE,
  classifyAnomaly,
  summarizeWindow,
  hourlyAggregates,
  weeklyProfile
} from "./stats/window";

export type { MinMax } from "./util/stats";
export { minMax, meanOf } from "./util/stats";

// ----------------------------
// Heatmap grids
// ----------------------------

export type { HeatmapColumn, HeatmapGrid, BandGridOptions, SpectrogramGridOptions } from "./grid/grids";
export { chronological, bandGrid, spectrogramGrid, weeklyGrid } from "./grid/grids";

// ----------------------------
// Measurement store
// ----------------------------

export type { MeasurementQuery, SpectrogramPayload, MeasurementStore } from "./store/types";
export { MeasurementStoreError } from "./store/types";
export type { FetchLike, HttpMeasurementStoreOptions } from "./store/httpStore";
export { HttpMeasurementStore } from "./store/httpStore";
export { RequestSequencer } from "./store/sequencer";
export type { MeasurementLoaderOptions, LoadWindowOptions } from "./store/loader";
export { MeasurementLoader } from "./store/loader";
