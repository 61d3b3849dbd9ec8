/**
 * SeriesLayer
 *
 * One series of a time-series chart: its data, style and rendering.
 */

import { normalizer } from "../normalizer.js";
import { renderLine, renderMarkers, renderStepped } from "../renderers/index.js";
import type {
  BaselineMode,
  ColorConfig,
  DrawingContext,
  NormalizationBounds,
  RenderPoint,
  Viewport,
} from "../types.js";
import { clamp, findTimeRange, upperBound } from "../utils.js";

/**
 * How a series is drawn: a polyline, a polyline filled down to the
 * baseline, a held step per bucket, or a dot per sample.
 */
export type SeriesMode = "line" | "filled" | "stepped" | "markers";

/** Time-aligned values; `null` is a gap */
export interface SeriesData {
  /** Epoch ms, ascending */
  times: Float64Array;
  values: (number | null)[];
}

export interface SeriesConfig {
  id: string;
  label?: string;
  data: SeriesData;
  mode?: SeriesMode;
  baseline?: BaselineMode;
  color?: ColorConfig;
  visible?: boolean;
}

export interface PlotArea {
  width: number;
  height: number;
}

const LAYER_DEFAULTS = {
  mode: "line",
  baseline: "bottom",
  color: { stroke: "#0ea5e9", fill: "rgba(14, 165, 233, 0.25)", strokeWidth: 1.5, opacity: 1 },
  visible: true,
} satisfies Required<Omit<SeriesConfig, "id" | "label" | "data">>;

export class SeriesLayer {
  readonly id: string;
  readonly label: string;

  private _data: SeriesData;
  private _mode: SeriesMode;
  private _baseline: BaselineMode;
  private _color: ColorConfig;
  private _visible: boolean;

  constructor(config: SeriesConfig) {
    if (config.data.times.length !== config.data.values.length) {
      throw new Error(
        `@noisescope/spectroviewer: series "${config.id}" has ${config.data.times.length} times but ${config.data.values.length} values`
      );
    }
    this.id = config.id;
    this.label = config.label ?? config.id;
    this._data = config.data;
    this._mode = config.mode ?? LAYER_DEFAULTS.mode;
    this._baseline = config.baseline ?? LAYER_DEFAULTS.baseline;
    this._color = { ...LAYER_DEFAULTS.color, ...config.color };
    this._visible = config.visible ?? LAYER_DEFAULTS.visible;
  }

  get data(): SeriesData {
    return this._data;
  }
  get mode(): SeriesMode {
    return this._mode;
  }
  get color(): ColorConfig {
    return this._color;
  }
  get visible(): boolean {
    return this._visible;
  }

  setData(data: SeriesData): void {
    this._data = data;
  }

  setVisible(visible: boolean): void {
    this._visible = visible;
  }

  /** First and last sample time, or null when empty */
  extent(): Viewport | null {
    const { times } = this._data;
    const start = times[0];
    const end = times[times.length - 1];
    return start === undefined || end === undefined ? null : { start, end };
  }

  /**
   * Value of the latest sample at or before `time`
   */
  valueAt(time: number): number | null {
    const idx = upperBound(this._data.times, time) - 1;
    return idx < 0 ? null : (this._data.values[idx] ?? null);
  }

  /**
   * Visible samples as pixel points, split into runs at gaps.
   *
   * One sample either side of the window is included so lines run to the
   * plot edges.
   */
  project(viewport: Viewport, bounds: NormalizationBounds, area: PlotArea): RenderPoint[][] {
    const { times, values } = this._data;
    const [from, to] = findTimeRange(times, viewport.start, viewport.end);
    const first = Math.max(0, from - 1);
    const last = Math.min(times.length, to + 1);
    const span = viewport.end - viewport.start;

    const runs: RenderPoint[][] = [];
    let run: RenderPoint[] = [];

    for (let i = first; i < last; i++) {
      const time = times[i];
      const value = values[i];
      if (time === undefined) continue;
      if (value === null || value === undefined || !Number.isFinite(value)) {
        if (run.length > 0) runs.push(run);
        run = [];
        continue;
      }

      const x = span > 0 ? ((time - viewport.start) / span) * area.width : 0;
      const y = area.height * (1 - clamp(normalizer.normalize(value, bounds), 0, 1));
      run.push({ x, y, value, time });
    }
    if (run.length > 0) runs.push(run);

    return runs;
  }

  render(
    ctx: DrawingContext,
    viewport: Viewport,
    bounds: NormalizationBounds,
    area: PlotArea
  ): void {
    if (!this._visible) return;

    for (const points of this.project(viewport, bounds, area)) {
      switch (this._mode) {
        case "line":
        case "filled":
          renderLine(ctx, points, {
            color: this._color,
            baseline: this._baseline,
            fillToBaseline: this._mode === "filled",
            plotHeight: area.height,
          });
          break;

        case "stepped":
          renderStepped(ctx, points, {
            color: this._color,
            baseline: this._baseline,
            fillToBaseline: false,
            plotHeight: area.height,
          });
          break;

        case "markers":
          renderMarkers(ctx, points, { color: this._color });
          break;
      }
    }
  }
}
