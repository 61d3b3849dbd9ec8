import type { DrawingContext, RasterSurface } from "./types.js";

export interface SurfaceOptions {
  /** Obtain the drawing context; defaults to `canvas.getContext("2d")` */
  getContext?: (canvas: HTMLCanvasElement) => DrawingContext | null;
  /** Measure the container in CSS pixels; defaults to its bounding rect */
  measure?: (container: HTMLElement) => { width: number; height: number };
  /** Device pixel ratio; defaults to `window.devicePixelRatio` */
  pixelRatio?: () => number;
}

/**
 * Create a canvas inside `container`, scaled for the device pixel ratio.
 *
 * The surface is owned by whichever renderer it is handed to.
 */
export function createRasterSurface(
  container: HTMLElement,
  options: SurfaceOptions = {}
): RasterSurface {
  const canvas = document.createElement("canvas");
  canvas.style.cssText =
    "position:absolute;left:0;top:0;width:100%;height:100%;";

  const ctx = options.getContext
    ? options.getContext(canvas)
    : canvas.getContext("2d");
  if (!ctx) throw new Error("@noisescope/spectroviewer: failed to get 2D context");

  const measure =
    options.measure ??
    ((el: HTMLElement) => {
      const rect = el.getBoundingClientRect();
      return { width: rect.width, height: rect.height };
    });
  const pixelRatio = options.pixelRatio ?? (() => window.devicePixelRatio || 1);

  let width = 0;
  let height = 0;

  const resize = () => {
    const dpr = pixelRatio();
    const size = measure(container);
    width = size.width;
    height = size.height;
    canvas.width = Math.round(width * dpr);
    canvas.height = Math.round(height * dpr);
    ctx.setTransform(dpr, 0, 0, dpr, 0, 0);
  };

  container.appendChild(canvas);
  resize();

  return {
    canvas,
    ctx,
    get width() {
      return width;
    },
    get height() {
      return height;
    },
    resize,
    dispose() {
      canvas.remove();
    },
  };
}
