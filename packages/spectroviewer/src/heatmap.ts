/**
 * Heatmap / spectrogram renderer
 *
 * One renderer owns one raster surface. Every `render` call is a full,
 * synchronous recompute: flatten the grid, estimate the display range over
 * exactly these values, then paint. Nothing is carried over from the
 * previous batch except the palette.
 */

import {
  DEFAULT_QUANTIZATION,
  DEFAULT_RANGE_OPTIONS,
  estimateRange,
  type HeatmapGrid,
  type RangeEstimate,
} from "@noisescope/acoustics";

import { isPaletteName, paletteLut, type PaletteName } from "./colormap.js";
import { renderGrid, renderRowLabels } from "./renderers/index.js";
import { readSettings, type DisplaySettingsStore } from "./settings.js";
import { createRasterSurface, type SurfaceOptions } from "./surface.js";
import type { RasterSurface } from "./types.js";

export const HEATMAP_SELECT_EVENT = "heatmap-select";

export interface HeatmapSelection {
  sampleIndex: number;
  rowId: string;
  /** Epoch ms, or null for non-temporal columns */
  timestamp: number | null;
}

export type RenderPhase = "idle" | "normalizing" | "range-estimating" | "painting";

export interface HeatmapOptions {
  palette?: PaletteName;
  /** Quantization floor; values at or below `dbFloor + 1` count as silence */
  dbFloor?: number;
  /** Values above this are clamped before range estimation */
  dbCeil?: number;
  loPercentile?: number;
  hiPercentile?: number;
  /** Minimum span of the color range in dB */
  minRange?: number;
  /** Background color; silent and absent cells show through to it */
  background?: string;
  /** Draw row labels along the left edge */
  showLabels?: boolean;
  /** Text drawn when the batch has no usable values */
  emptyText?: string;
  onSelect?: (selection: HeatmapSelection) => void;
  /** Shared display settings; palette and range options follow it */
  settings?: DisplaySettingsStore;
}

type ResolvedOptions = Required<Omit<HeatmapOptions, "onSelect" | "settings">>;

const DEFAULTS: ResolvedOptions = {
  palette: "viridis",
  dbFloor: DEFAULT_QUANTIZATION.dbFloor,
  dbCeil: DEFAULT_QUANTIZATION.dbCeil,
  loPercentile: DEFAULT_RANGE_OPTIONS.loPercentile,
  hiPercentile: DEFAULT_RANGE_OPTIONS.hiPercentile,
  minRange: DEFAULT_RANGE_OPTIONS.minRange,
  background: "#111827",
  showLabels: false,
  emptyText: "No data",
};

function definedOnly(options: HeatmapOptions): Partial<ResolvedOptions> {
  const out: Partial<ResolvedOptions> = {};
  if (options.palette !== undefined) out.palette = options.palette;
  if (options.dbFloor !== undefined) out.dbFloor = options.dbFloor;
  if (options.dbCeil !== undefined) out.dbCeil = options.dbCeil;
  if (options.loPercentile !== undefined) out.loPercentile = options.loPercentile;
  if (options.hiPercentile !== undefined) out.hiPercentile = options.hiPercentile;
  if (options.minRange !== undefined) out.minRange = options.minRange;
  if (options.background !== undefined) out.background = options.background;
  if (options.showLabels !== undefined) out.showLabels = options.showLabels;
  if (options.emptyText !== undefined) out.emptyText = options.emptyText;
  return out;
}

export class HeatmapRenderer {
  private readonly surface: RasterSurface;
  private options: ResolvedOptions;
  private readonly onSelect?: (selection: HeatmapSelection) => void;

  private grid: HeatmapGrid | null = null;
  private values: (number | null)[] = [];
  private _range: RangeEstimate | null = null;
  private _phase: RenderPhase = "idle";
  private disposed = false;
  private unsubscribeSettings: (() => void) | null = null;

  constructor(surface: RasterSurface, options: HeatmapOptions = {}) {
    this.surface = surface;
    this.onSelect = options.onSelect;
    this.options = { ...DEFAULTS, ...definedOnly(options) };

    if (options.settings) this.bindSettings(options.settings);

    this.surface.canvas.addEventListener("click", this.handleClick);
  }

  get phase(): RenderPhase {
    return this._phase;
  }

  /** Range used by the most recent paint */
  get range(): RangeEstimate | null {
    return this._range;
  }

  get palette(): PaletteName {
    return this.options.palette;
  }

  /** Number of columns in the current grid */
  get sampleCount(): number {
    return this.grid?.columns.length ?? 0;
  }

  private bindSettings(store: DisplaySettingsStore): void {
    this.options = { ...this.options, ...readSettings(store) };
    this.unsubscribeSettings = store.subscribe((state, prev) => {
      const rangeChanged =
        state.dbFloor !== prev.dbFloor ||
        state.dbCeil !== prev.dbCeil ||
        state.loPercentile !== prev.loPercentile ||
        state.hiPercentile !== prev.hiPercentile;

      if (rangeChanged) {
        this.options = { ...this.options, ...readSettings(store) };
        if (this.grid) this.render(this.grid);
      } else if (state.palette !== prev.palette) {
        this.setPalette(state.palette);
      }
    });
  }

  /**
   * Replace the batch and repaint from scratch
   */
  render(grid: HeatmapGrid, options: Omit<HeatmapOptions, "onSelect" | "settings"> = {}): void {
    if (this.disposed) return;
    this.options = { ...this.options, ...definedOnly(options) };

    this._phase = "normalizing";
    this.grid = grid;
    this.values = [];
    for (const column of grid.columns) {
      for (let r = 0; r < grid.rowCount; r++) {
        this.values.push(column.values[r] ?? null);
      }
    }

    this._phase = "range-estimating";
    this._range = estimateRange(this.values, {
      loPercentile: this.options.loPercentile,
      hiPercentile: this.options.hiPercentile,
      minRange: this.options.minRange,
      excludeAtOrBelow: this.floorDb(),
      ceiling: this.options.dbCeil,
    });

    this.paint();
  }

  /**
   * Switch palette and repaint with the same range
   */
  setPalette(name: PaletteName): void {
    if (!isPaletteName(name)) {
      throw new Error(`@noisescope/spectroviewer: unknown palette "${name}"`);
    }
    this.options = { ...this.options, palette: name };
    if (this.grid && this._range) this.paint();
  }

  /**
   * Re-measure the surface and recompute everything
   */
  resize(): void {
    if (this.disposed) return;
    this.surface.resize();
    if (this.grid) this.render(this.grid);
  }

  /**
   * Column index under a CSS x coordinate, or null outside the grid
   */
  sampleIndexAt(x: number): number | null {
    const count = this.sampleCount;
    const width = this.surface.width;
    if (count === 0 || width <= 0) return null;

    const index = Math.floor((x / width) * count);
    return index >= 0 && index < count ? index : null;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.surface.canvas.removeEventListener("click", this.handleClick);
    this.unsubscribeSettings?.();
    this.unsubscribeSettings = null;
    this.surface.dispose();
    this.grid = null;
    this.values = [];
  }

  private floorDb(): number {
    // Byte 0 decodes to dbFloor, so anything within a dB of it is silence.
    return this.options.dbFloor + 1;
  }

  private paint(): void {
    const range = this._range;
    if (!range) return;
    this._phase = "painting";

    const { ctx, width, height } = this.surface;
    ctx.clearRect(0, 0, width, height);
    ctx.fillStyle = this.options.background;
    ctx.fillRect(0, 0, width, height);

    if (range.isFallback || !this.grid) {
      this.paintEmpty();
    } else {
      renderGrid(ctx, this.grid, {
        width,
        height,
        minDb: range.minDb,
        maxDb: range.maxDb,
        floorDb: this.floorDb(),
        lut: paletteLut(this.options.palette),
      });
      if (this.options.showLabels) {
        renderRowLabels(ctx, this.grid.rowLabels, { width, height });
      }
    }

    this._phase = "idle";
  }

  private paintEmpty(): void {
    const { ctx, width, height } = this.surface;
    ctx.save();
    ctx.fillStyle = "rgba(255, 255, 255, 0.6)";
    ctx.font = "12px sans-serif";
    ctx.textAlign = "center";
    ctx.textBaseline = "middle";
    ctx.fillText(this.options.emptyText, width / 2, height / 2);
    ctx.restore();
  }

  private readonly handleClick = (event: MouseEvent): void => {
    if (!this.grid) return;

    const rect = this.surface.canvas.getBoundingClientRect();
    const sampleIndex = this.sampleIndexAt(event.clientX - rect.left);
    if (sampleIndex === null) return;

    const column = this.grid.columns[sampleIndex];
    if (!column) return;

    const selection: HeatmapSelection = {
      sampleIndex,
      rowId: column.id,
      timestamp: column.timestamp,
    };
    this.surface.canvas.dispatchEvent(
      new CustomEvent<HeatmapSelection>(HEATMAP_SELECT_EVENT, { detail: selection, bubbles: true })
    );
    this.onSelect?.(selection);
  };
}

export interface MountHeatmapOptions extends HeatmapOptions {
  surface?: SurfaceOptions;
}

/**
 * Create a renderer on a fresh surface inside the element with `containerId`.
 *
 * The caller owns the returned renderer; render again to replace the batch,
 * or dispose it before mounting another renderer in the same container.
 */
export function mountHeatmap(containerId: string, options: MountHeatmapOptions = {}): HeatmapRenderer {
  const container = document.getElementById(containerId);
  if (!container) {
    throw new Error(`@noisescope/spectroviewer: no element with id "${containerId}"`);
  }
  const { surface: surfaceOptions, ...rendererOptions } = options;
  return new HeatmapRenderer(createRasterSurface(container, surfaceOptions), rendererOptions);
}

/**
 * Mount a renderer and paint `grid` into it in one call.
 */
export function renderHeatmap(
  containerId: string,
  grid: HeatmapGrid,
  options: MountHeatmapOptions = {}
): HeatmapRenderer {
  const renderer = mountHeatmap(containerId, options);
  renderer.render(grid);
  return renderer;
}
