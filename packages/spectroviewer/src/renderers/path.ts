/**
 * Polyline renderers for one gap-free run of points.
 *
 * `renderLine` joins samples with straight segments; `renderStepped` holds
 * each value until the next sample, which suits bucketed data such as
 * hourly aggregates.
 */

import type { BaselineMode, ColorConfig, DrawingContext, RenderPoint } from "../types.js";

export type PathShape = "linear" | "step";

export interface PathRenderOptions {
  color: ColorConfig;
  baseline: BaselineMode;
  /** Close the run down to the baseline and fill it before stroking */
  fillToBaseline: boolean;
  plotHeight: number;
}

const DEFAULT_STROKE = "#0ea5e9";
const DEFAULT_FILL = "rgba(14, 165, 233, 0.25)";
const DEFAULT_WIDTH = 1.5;

/** Pixel row of a baseline; `{ y }` counts up from the bottom edge */
export function baselineToPixels(baseline: BaselineMode, plotHeight: number): number {
  return baseline === "bottom" ? plotHeight : plotHeight * (1 - baseline.y);
}

function appendVertices(ctx: DrawingContext, points: readonly RenderPoint[], shape: PathShape): void {
  let prevY: number | null = null;
  for (const { x, y } of points) {
    if (prevY === null) {
      ctx.moveTo(x, y);
    } else {
      if (shape === "step") ctx.lineTo(x, prevY);
      ctx.lineTo(x, y);
    }
    prevY = y;
  }
}

function drawPath(
  ctx: DrawingContext,
  points: readonly RenderPoint[],
  shape: PathShape,
  { color, baseline, fillToBaseline, plotHeight }: PathRenderOptions
): void {
  const head = points[0];
  const tail = points[points.length - 1];
  if (!head || !tail) return;

  ctx.save();
  ctx.globalAlpha = color.opacity ?? 1;

  if (fillToBaseline) {
    const floorY = baselineToPixels(baseline, plotHeight);
    ctx.beginPath();
    appendVertices(ctx, points, shape);
    ctx.lineTo(tail.x, floorY);
    ctx.lineTo(head.x, floorY);
    ctx.closePath();
    ctx.fillStyle = color.fill ?? DEFAULT_FILL;
    ctx.fill();
  }

  ctx.beginPath();
  appendVertices(ctx, points, shape);
  ctx.strokeStyle = color.stroke ?? DEFAULT_STROKE;
  ctx.lineWidth = color.strokeWidth ?? DEFAULT_WIDTH;
  // Square corners keep the steps crisp.
  ctx.lineJoin = shape === "step" ? "miter" : "round";
  ctx.lineCap = shape === "step" ? "butt" : "round";
  ctx.stroke();

  ctx.restore();
}

export function renderLine(ctx: DrawingContext, points: readonly RenderPoint[], options: PathRenderOptions): void {
  drawPath(ctx, points, "linear", options);
}

export function renderStepped(ctx: DrawingContext, points: readonly RenderPoint[], options: PathRenderOptions): void {
  drawPath(ctx, points, "step", options);
}
