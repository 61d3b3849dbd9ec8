/**
 * Heatmap grid renderer
 *
 * Paints a column-major grid of dB cells. Row 0 is the lowest frequency
 * and is drawn at the bottom. Absent cells, and cells at or below the
 * silence floor, are left as background so "no signal" stays distinct
 * from the bottom of the palette.
 */

import type { HeatmapGrid } from "@noisescope/acoustics";

import { lutColor } from "../colormap.js";
import type { DrawingContext } from "../types.js";

export interface GridRenderOptions {
  width: number;
  height: number;
  /** Display range the palette spans */
  minDb: number;
  maxDb: number;
  /** Values at or below this are not painted */
  floorDb: number;
  lut: readonly string[];
}

/**
 * Paint every cell of the grid; returns the number of cells painted
 */
export function renderGrid(
  ctx: DrawingContext,
  grid: HeatmapGrid,
  options: GridRenderOptions
): number {
  const { width, height, minDb, maxDb, floorDb, lut } = options;
  const columnCount = grid.columns.length;
  if (columnCount === 0 || grid.rowCount === 0) return 0;

  const cellWidth = width / columnCount;
  const cellHeight = height / grid.rowCount;
  const span = maxDb - minDb;
  let painted = 0;

  for (let c = 0; c < columnCount; c++) {
    const column = grid.columns[c];
    if (!column) continue;

    const x = c * cellWidth;
    for (let r = 0; r < grid.rowCount; r++) {
      const value = column.values[r];
      if (value === null || value === undefined || !Number.isFinite(value)) continue;
      if (value <= floorDb) continue;

      ctx.fillStyle = lutColor(lut, span > 0 ? (value - minDb) / span : 0.5);
      ctx.fillRect(x, height - (r + 1) * cellHeight, Math.max(1, cellWidth), Math.max(1, cellHeight));
      painted++;
    }
  }

  return painted;
}

export interface GridLabelOptions {
  width: number;
  height: number;
  color?: string;
  font?: string;
}

/**
 * Draw row labels along the left edge, one per row, bottom-up
 */
export function renderRowLabels(
  ctx: DrawingContext,
  labels: readonly string[],
  options: GridLabelOptions
): void {
  if (labels.length === 0) return;
  const cellHeight = options.height / labels.length;

  ctx.save();
  ctx.fillStyle = options.color ?? "rgba(255, 255, 255, 0.8)";
  ctx.font = options.font ?? "10px sans-serif";
  ctx.textAlign = "left";
  ctx.textBaseline = "middle";

  // Thin out labels when rows are shorter than the text.
  const step = Math.max(1, Math.ceil(12 / cellHeight));
  for (let r = 0; r < labels.length; r += step) {
    const label = labels[r];
    if (label === undefined) continue;
    ctx.fillText(label, 2, options.height - (r + 0.5) * cellHeight);
  }

  ctx.restore();
}
