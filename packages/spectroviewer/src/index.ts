/**
 * @noisescope/spectroviewer
 *
 * Canvas views for acoustic monitoring data: band and spectrogram heatmaps
 * with adaptive color range, and time-series charts that share a zoomable
 * time axis.
 *
 * @example
 * ```typescript
 * import { bandGrid, HttpMeasurementStore, MeasurementLoader } from "@noisescope/acoustics";
 * import { mountHeatmap, mountTimeSeriesChart, levelSeries, ViewportSync } from "@noisescope/spectroviewer";
 *
 * const loader = new MeasurementLoader(new HttpMeasurementStore("/api"));
 * const batch = await loader.loadWindow({ start: Date.now() - 86_400_000, end: Date.now() });
 * if (batch) {
 *   const heatmap = mountHeatmap("bands", { palette: "magma", showLabels: true });
 *   heatmap.render(bandGrid(batch, { order: "oldest-first" }));
 *
 *   const sync = new ViewportSync();
 *   sync.register(mountTimeSeriesChart("levels", { series: levelSeries(batch.rows, "oldest-first") }));
 * }
 * ```
 */

// Color mapping
export {
  PALETTE_NAMES,
  PALETTES,
  LUT_SIZE,
  isPaletteName,
  colorAt,
  rgbToCss,
  paletteLut,
  lutColor,
} from "./colormap.js";
export type { PaletteName, Palette } from "./colormap.js";

// Surfaces
export { createRasterSurface } from "./surface.js";
export type { SurfaceOptions } from "./surface.js";

// Heatmap / spectrogram
export {
  HEATMAP_SELECT_EVENT,
  HeatmapRenderer,
  mountHeatmap,
  renderHeatmap,
} from "./heatmap.js";
export type {
  HeatmapSelection,
  HeatmapOptions,
  MountHeatmapOptions,
  RenderPhase,
} from "./heatmap.js";

// Display settings
export {
  displaySettingsSchema,
  DEFAULT_DISPLAY_SETTINGS,
  createDisplaySettingsStore,
  readSettings,
} from "./settings.js";
export type {
  DisplaySettings,
  DisplaySettingsState,
  DisplaySettingsStore,
} from "./settings.js";

// Time series
export {
  DEFAULT_MIN_VIEWPORT_MS,
  TimeSeriesChart,
  enforceMinimumWidth,
  mountTimeSeriesChart,
} from "./timeseries/chart.js";
export type {
  ThresholdLine,
  TimeSeriesChartOptions,
  MountChartOptions,
  ViewportListener,
} from "./timeseries/chart.js";
export { SeriesLayer } from "./timeseries/layer.js";
export type { SeriesMode, SeriesData, SeriesConfig, PlotArea } from "./timeseries/layer.js";
export { ViewportSync } from "./timeseries/sync.js";
export type {
  SyncableChart,
  ViewportSyncState,
  ViewportSyncOptions,
  SyncListener,
} from "./timeseries/sync.js";
export {
  ANOMALY_CHART_THRESHOLD,
  ANOMALY_CHART_OPTIONS,
  toSeriesData,
  levelSeries,
  anomalySeries,
  centroidSeries,
  hourlySeries,
} from "./timeseries/presets.js";

// Normalization
export { Normalizer, normalizer } from "./normalizer.js";
export type { AxisOptions, VisibleSeries } from "./normalizer.js";

// Types
export type {
  DrawingContext,
  RasterSurface,
  Rgb,
  ColorConfig,
  BaselineMode,
  RenderPoint,
  NormalizationBounds,
  Viewport,
} from "./types.js";

// Utilities (useful for custom renderers)
export {
  clamp,
  lerp,
  lowerBound,
  upperBound,
  findTimeRange,
  parseHexColor,
  formatTimeLabel,
} from "./utils.js";

// Renderers (for custom rendering)
export {
  renderGrid,
  renderRowLabels,
  renderLine,
  renderStepped,
  baselineToPixels,
  renderMarkers,
  renderThreshold,
} from "./renderers/index.js";
export type {
  GridRenderOptions,
  GridLabelOptions,
  PathShape,
  PathRenderOptions,
  MarkerRenderOptions,
  ThresholdRenderOptions,
} from "./renderers/index.js";
