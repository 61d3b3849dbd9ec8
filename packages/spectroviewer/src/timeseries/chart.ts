/**
 * TimeSeriesChart
 *
 * Plots one or more series against a shared time axis on an owned raster
 * surface. The time viewport can be changed by wheel zoom, drag pan or
 * programmatically; the value axis rescales to what is visible.
 */

import { nanoid } from "nanoid";

import { normalizer, type AxisOptions } from "../normalizer.js";
import { renderThreshold } from "../renderers/index.js";
import { createRasterSurface, type SurfaceOptions } from "../surface.js";
import type { NormalizationBounds, RasterSurface, Viewport } from "../types.js";
import { clamp, formatTimeLabel } from "../utils.js";
import { SeriesLayer, type SeriesConfig, type SeriesData } from "./layer.js";

export const DEFAULT_MIN_VIEWPORT_MS = 60_000;

/** Zoom factor per wheel notch */
const WHEEL_ZOOM = 1.2;

const TIME_LABEL_COUNT = 4;

export interface ThresholdLine {
  value: number;
  color?: string;
  dash?: number[];
}

export interface TimeSeriesChartOptions extends AxisOptions {
  id?: string;
  series?: SeriesConfig[];
  threshold?: ThresholdLine;
  minViewportMs?: number;
  background?: string;
  /** Enable wheel zoom and drag pan (default: true) */
  interactive?: boolean;
  /** Draw UTC time labels along the bottom edge */
  showTimeLabels?: boolean;
}

export type ViewportListener = (start: number, end: number) => void;

/**
 * Widen a viewport symmetrically to at least `minWidth`
 */
export function enforceMinimumWidth(viewport: Viewport, minWidth: number): Viewport {
  if (viewport.end - viewport.start >= minWidth) return viewport;
  const mid = (viewport.start + viewport.end) / 2;
  return { start: mid - minWidth / 2, end: mid + minWidth / 2 };
}

export class TimeSeriesChart {
  readonly id: string;

  private readonly surface: RasterSurface;
  private readonly layers = new Map<string, SeriesLayer>();
  private readonly listeners = new Set<ViewportListener>();
  private readonly axis: AxisOptions;
  private readonly threshold?: ThresholdLine;
  private readonly minViewportMs: number;
  private readonly background?: string;
  private readonly interactive: boolean;
  private readonly showTimeLabels: boolean;

  private viewport: Viewport | null = null;
  private drag: { x: number; viewport: Viewport } | null = null;
  private disposed = false;

  constructor(surface: RasterSurface, options: TimeSeriesChartOptions = {}) {
    this.id = options.id ?? nanoid(10);
    this.surface = surface;
    this.axis = { yMin: options.yMin, ySuggestedMax: options.ySuggestedMax, padding: options.padding };
    this.threshold = options.threshold;
    this.minViewportMs = options.minViewportMs ?? DEFAULT_MIN_VIEWPORT_MS;
    this.background = options.background;
    this.interactive = options.interactive ?? true;
    this.showTimeLabels = options.showTimeLabels ?? false;

    for (const config of options.series ?? []) {
      this.layers.set(config.id, new SeriesLayer(config));
    }

    if (this.interactive) {
      const canvas = this.surface.canvas;
      canvas.addEventListener("wheel", this.handleWheel);
      canvas.addEventListener("mousedown", this.handleMouseDown);
      canvas.addEventListener("mousemove", this.handleMouseMove);
      canvas.addEventListener("mouseup", this.handleMouseUp);
      canvas.addEventListener("mouseleave", this.handleMouseUp);
    }

    this.render();
  }

  /**
   * Time extent covered by all series
   */
  dataExtent(): Viewport | null {
    let start = Infinity;
    let end = -Infinity;
    for (const layer of this.layers.values()) {
      const extent = layer.extent();
      if (!extent) continue;
      start = Math.min(start, extent.start);
      end = Math.max(end, extent.end);
    }
    return Number.isFinite(start) ? { start, end } : null;
  }

  /** Current viewport; the full data extent until one is set */
  getViewport(): Viewport | null {
    return this.viewport ?? this.defaultViewport();
  }

  private defaultViewport(): Viewport | null {
    const extent = this.dataExtent();
    return extent ? enforceMinimumWidth(extent, this.minViewportMs) : null;
  }

  /**
   * Set the visible time range and notify listeners.
   *
   * Ranges narrower than the minimum width are widened around their centre.
   */
  setViewport(start: number, end: number): void {
    if (this.disposed || !Number.isFinite(start) || !Number.isFinite(end) || end <= start) return;

    const next = enforceMinimumWidth({ start, end }, this.minViewportMs);
    if (this.viewport && this.viewport.start === next.start && this.viewport.end === next.end) return;

    this.viewport = next;
    this.render();
    for (const listener of this.listeners) listener(next.start, next.end);
  }

  /** Back to the full data extent */
  resetViewport(): void {
    const full = this.defaultViewport();
    if (full) this.setViewport(full.start, full.end);
  }

  onViewportChange(listener: ViewportListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  addSeries(config: SeriesConfig): void {
    this.layers.set(config.id, new SeriesLayer(config));
    this.render();
  }

  removeSeries(id: string): void {
    this.layers.delete(id);
    this.render();
  }

  setSeriesData(id: string, data: SeriesData): void {
    const layer = this.layers.get(id);
    if (!layer) return;
    layer.setData(data);
    this.render();
  }

  getSeries(id: string): SeriesLayer | undefined {
    return this.layers.get(id);
  }

  /** Value-axis bounds for the current viewport */
  getBounds(): NormalizationBounds | null {
    const viewport = this.getViewport();
    if (!viewport) return null;
    const visible = [...this.layers.values()].filter((l) => l.visible).map((l) => l.data);
    return normalizer.computeBounds(visible, viewport, this.axis);
  }

  /** Map epoch ms to a CSS x coordinate in the current viewport */
  timeToX(time: number): number {
    const viewport = this.getViewport();
    if (!viewport) return 0;
    return ((time - viewport.start) / (viewport.end - viewport.start)) * this.surface.width;
  }

  /** Map a CSS x coordinate to epoch ms in the current viewport */
  xToTime(x: number): number {
    const viewport = this.getViewport();
    if (!viewport || this.surface.width <= 0) return 0;
    return viewport.start + (x / this.surface.width) * (viewport.end - viewport.start);
  }

  /**
   * Zoom around `anchor` (epoch ms); factor > 1 zooms out
   */
  zoom(factor: number, anchor?: number): void {
    const viewport = this.getViewport();
    if (!viewport || !(factor > 0)) return;
    const center = anchor ?? (viewport.start + viewport.end) / 2;
    this.setViewport(
      center - (center - viewport.start) * factor,
      center + (viewport.end - center) * factor
    );
  }

  /** Shift the viewport by `deltaMs` */
  pan(deltaMs: number): void {
    const viewport = this.getViewport();
    if (!viewport) return;
    this.setViewport(viewport.start + deltaMs, viewport.end + deltaMs);
  }

  /**
   * Full repaint
   */
  render(): void {
    if (this.disposed) return;
    const { ctx, width, height } = this.surface;

    ctx.clearRect(0, 0, width, height);
    if (this.background) {
      ctx.fillStyle = this.background;
      ctx.fillRect(0, 0, width, height);
    }

    const viewport = this.getViewport();
    const bounds = this.getBounds();
    if (!viewport || !bounds || width === 0 || height === 0) return;

    for (const layer of this.layers.values()) {
      layer.render(ctx, viewport, bounds, { width, height });
    }

    if (this.threshold) {
      const t = normalizer.normalize(this.threshold.value, bounds);
      if (t >= 0 && t <= 1) {
        renderThreshold(ctx, height * (1 - t), {
          width,
          color: this.threshold.color,
          dash: this.threshold.dash,
        });
      }
    }

    if (this.showTimeLabels) this.renderTimeLabels(viewport);
  }

  private renderTimeLabels(viewport: Viewport): void {
    const { ctx, width, height } = this.surface;
    const span = viewport.end - viewport.start;

    ctx.save();
    ctx.fillStyle = "rgba(255, 255, 255, 0.6)";
    ctx.font = "10px sans-serif";
    ctx.textAlign = "center";
    ctx.textBaseline = "bottom";
    for (let i = 1; i <= TIME_LABEL_COUNT; i++) {
      const x = (width * i) / (TIME_LABEL_COUNT + 1);
      ctx.fillText(formatTimeLabel(viewport.start + (span * i) / (TIME_LABEL_COUNT + 1), span), x, height - 2);
    }
    ctx.restore();
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    const canvas = this.surface.canvas;
    canvas.removeEventListener("wheel", this.handleWheel);
    canvas.removeEventListener("mousedown", this.handleMouseDown);
    canvas.removeEventListener("mousemove", this.handleMouseMove);
    canvas.removeEventListener("mouseup", this.handleMouseUp);
    canvas.removeEventListener("mouseleave", this.handleMouseUp);
    this.listeners.clear();
    this.layers.clear();
    this.surface.dispose();
  }

  private localX(event: MouseEvent): number {
    const rect = this.surface.canvas.getBoundingClientRect();
    return clamp(event.clientX - rect.left, 0, this.surface.width);
  }

  private readonly handleWheel = (event: WheelEvent): void => {
    if (event.deltaY === 0) return;
    event.preventDefault();
    const anchor = this.xToTime(this.localX(event));
    this.zoom(event.deltaY > 0 ? WHEEL_ZOOM : 1 / WHEEL_ZOOM, anchor);
  };

  private readonly handleMouseDown = (event: MouseEvent): void => {
    const viewport = this.getViewport();
    if (!viewport || event.button !== 0) return;
    this.drag = { x: this.localX(event), viewport };
  };

  private readonly handleMouseMove = (event: MouseEvent): void => {
    const drag = this.drag;
    if (!drag || this.surface.width <= 0) return;
    const dx = this.localX(event) - drag.x;
    const span = drag.viewport.end - drag.viewport.start;
    const shift = -(dx / this.surface.width) * span;
    this.setViewport(drag.viewport.start + shift, drag.viewport.end + shift);
  };

  private readonly handleMouseUp = (): void => {
    this.drag = null;
  };
}

export interface MountChartOptions extends TimeSeriesChartOptions {
  surface?: SurfaceOptions;
}

/**
 * Create a chart on a fresh surface inside the element with `containerId`.
 * The caller owns the chart and disposes it before mounting another.
 */
export function mountTimeSeriesChart(containerId: string, options: MountChartOptions = {}): TimeSeriesChart {
  const container = document.getElementById(containerId);
  if (!container) {
    throw new Error(`@noisescope/spectroviewer: no element with id "${containerId}"`);
  }
  const { surface: surfaceOptions, ...chartOptions } = options;
  return new TimeSeriesChart(createRasterSurface(container, surfaceOptions), chartOptions);
}
