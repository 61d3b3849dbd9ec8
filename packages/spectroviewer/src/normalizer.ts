/**
 * Y-axis normalization for time-series charts
 *
 * Each chart scales its value axis to what is visible inside the current
 * time window; only the time axis is shared between charts.
 */

import type { NormalizationBounds, Viewport } from "./types.js";
import { findTimeRange } from "./utils.js";

export interface AxisOptions {
  /** Fixed lower bound (e.g. 0 for anomaly scores) */
  yMin?: number;
  /** Upper bound the axis extends to at least, if the data stays below it */
  ySuggestedMax?: number;
  /** Fraction of the span added above and below (default 0.05) */
  padding?: number;
}

export interface VisibleSeries {
  times: ArrayLike<number>;
  values: ArrayLike<number | null>;
}

export class Normalizer {
  /**
   * Min/max of the finite values whose time lies inside the viewport
   */
  visibleExtent(series: readonly VisibleSeries[], viewport: Viewport): NormalizationBounds | null {
    let min = Infinity;
    let max = -Infinity;

    for (const { times, values } of series) {
      const [from, to] = findTimeRange(times, viewport.start, viewport.end);
      for (let i = from; i < to; i++) {
        const v = values[i];
        if (v === null || v === undefined || !Number.isFinite(v)) continue;
        if (v < min) min = v;
        if (v > max) max = v;
      }
    }

    return Number.isFinite(min) ? { min, max } : null;
  }

  /**
   * Axis bounds for the visible values, honouring fixed and suggested limits
   */
  computeBounds(
    series: readonly VisibleSeries[],
    viewport: Viewport,
    options: AxisOptions = {}
  ): NormalizationBounds {
    const extent = this.visibleExtent(series, viewport);
    const padding = options.padding ?? 0.05;

    let min = extent?.min ?? options.yMin ?? 0;
    let max = extent?.max ?? options.ySuggestedMax ?? min + 1;

    const span = max - min;
    if (extent && span > 0) {
      min -= span * padding;
      max += span * padding;
    }

    if (options.yMin !== undefined) min = options.yMin;
    if (options.ySuggestedMax !== undefined && max < options.ySuggestedMax) {
      max = options.ySuggestedMax;
    }
    if (max <= min) max = min + 1;

    return { min, max };
  }

  /**
   * Normalize a single value given bounds
   */
  normalize(value: number, bounds: NormalizationBounds): number {
    if (bounds.max === bounds.min) return 0.5;
    return (value - bounds.min) / (bounds.max - bounds.min);
  }

  /**
   * Denormalize a value back to original domain
   */
  denormalize(normalized: number, bounds: NormalizationBounds): number {
    return bounds.min + normalized * (bounds.max - bounds.min);
  }
}

/** Shared normalizer instance */
export const normalizer = new Normalizer();
