import type { ColorConfig, DrawingContext, RenderPoint } from "../types.js";

export interface MarkerRenderOptions {
  color: ColorConfig;
  /** Dot radius in CSS pixels */
  radius?: number;
}

const MARKER_COLOR = "#f59e0b";
const FULL_TURN = Math.PI * 2;

/**
 * One filled dot per sample; outlined when the color sets a stroke width.
 */
export function renderMarkers(
  ctx: DrawingContext,
  points: readonly RenderPoint[],
  { color, radius = 3 }: MarkerRenderOptions
): void {
  if (points.length === 0) return;

  const outline = color.strokeWidth ?? 0;

  ctx.save();
  ctx.globalAlpha = color.opacity ?? 1;
  ctx.fillStyle = color.fill ?? color.stroke ?? MARKER_COLOR;
  if (outline > 0) {
    ctx.strokeStyle = color.stroke ?? MARKER_COLOR;
    ctx.lineWidth = outline;
  }

  for (const { x, y } of points) {
    ctx.beginPath();
    ctx.arc(x, y, radius, 0, FULL_TURN);
    ctx.fill();
    if (outline > 0) ctx.stroke();
  }

  ctx.restore();
}

export interface ThresholdRenderOptions {
  width: number;
  color?: string;
  dash?: number[];
}

/** Dashed horizontal rule across the plot at pixel row `y` */
export function renderThreshold(ctx: DrawingContext, y: number, { width, color, dash }: ThresholdRenderOptions): void {
  ctx.save();
  ctx.strokeStyle = color ?? "rgba(239, 68, 68, 0.8)";
  ctx.lineWidth = 1;
  ctx.setLineDash(dash ?? [4, 4]);
  ctx.beginPath();
  ctx.moveTo(0, y);
  ctx.lineTo(width, y);
  ctx.stroke();
  ctx.setLineDash([]);
  ctx.restore();
}
