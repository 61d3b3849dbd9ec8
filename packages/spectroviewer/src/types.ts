/**
 * Shared types for the spectroviewer renderers
 */

/**
 * The subset of the 2D canvas API the renderers draw with.
 *
 * `CanvasRenderingContext2D` satisfies it; tests pass a recording stand-in.
 */
export type DrawingContext = Pick<
  CanvasRenderingContext2D,
  | "save"
  | "restore"
  | "setTransform"
  | "clearRect"
  | "fillRect"
  | "fillText"
  | "beginPath"
  | "moveTo"
  | "lineTo"
  | "closePath"
  | "arc"
  | "fill"
  | "stroke"
  | "setLineDash"
  | "fillStyle"
  | "strokeStyle"
  | "lineWidth"
  | "lineJoin"
  | "lineCap"
  | "globalAlpha"
  | "font"
  | "textAlign"
  | "textBaseline"
>;

/** Canvas owned by exactly one renderer, sized in CSS pixels. */
export interface RasterSurface {
  readonly canvas: HTMLCanvasElement;
  readonly ctx: DrawingContext;
  /** CSS width in pixels */
  readonly width: number;
  /** CSS height in pixels */
  readonly height: number;
  /** Re-measure the container and rescale the backing store */
  resize(): void;
  /** Detach the canvas from its container */
  dispose(): void;
}

/** RGB triple, each channel 0-255 */
export type Rgb = readonly [number, number, number];

/** Color configuration for series renderers */
export interface ColorConfig {
  /** Primary line color */
  stroke?: string;
  /** Fill color (filled mode, marker fill) */
  fill?: string;
  /** Stroke width in pixels */
  strokeWidth?: number;
  /** Opacity (0-1) */
  opacity?: number;
}

/** Where the fill of a filled series closes */
export type BaselineMode =
  | "bottom" // Baseline at bottom (positive-only signals)
  | { y: number }; // Custom baseline in normalized [0,1] space

/** Point for rendering */
export interface RenderPoint {
  x: number;
  y: number;
  /** Original value (for hover readout) */
  value: number;
  /** Original time, epoch ms */
  time: number;
}

/** Value bounds of a y axis */
export interface NormalizationBounds {
  min: number;
  max: number;
}

/** Visible time range of a chart, epoch ms */
export interface Viewport {
  start: number;
  end: number;
}
