import type { Measurement } from "@noisescope/acoustics";

import { createRasterSurface, type DrawingContext, type RasterSurface } from "../src/index";

export interface DrawCall {
  method: string;
  args: unknown[];
  fillStyle: string;
  strokeStyle: string;
}

/** DrawingContext stand-in that records every call with the current styles */
export class RecordingContext implements DrawingContext {
  fillStyle: string | CanvasGradient | CanvasPattern = "#000000";
  strokeStyle: string | CanvasGradient | CanvasPattern = "#000000";
  lineWidth = 1;
  lineJoin: CanvasLineJoin = "miter";
  lineCap: CanvasLineCap = "butt";
  globalAlpha = 1;
  font = "10px sans-serif";
  textAlign: CanvasTextAlign = "start";
  textBaseline: CanvasTextBaseline = "alphabetic";

  calls: DrawCall[] = [];

  private record(method: string, args: unknown[]): void {
    this.calls.push({
      method,
      args,
      fillStyle: String(this.fillStyle),
      strokeStyle: String(this.strokeStyle),
    });
  }

  /** Recorded calls of one method */
  of(method: string): DrawCall[] {
    return this.calls.filter((c) => c.method === method);
  }

  reset(): void {
    this.calls = [];
  }

  save(): void {
    this.record("save", []);
  }
  restore(): void {
    this.record("restore", []);
  }
  setTransform(...args: unknown[]): void {
    this.record("setTransform", args);
  }
  clearRect(x: number, y: number, w: number, h: number): void {
    this.record("clearRect", [x, y, w, h]);
  }
  fillRect(x: number, y: number, w: number, h: number): void {
    this.record("fillRect", [x, y, w, h]);
  }
  fillText(text: string, x: number, y: number): void {
    this.record("fillText", [text, x, y]);
  }
  beginPath(): void {
    this.record("beginPath", []);
  }
  closePath(): void {
    this.record("closePath", []);
  }
  moveTo(x: number, y: number): void {
    this.record("moveTo", [x, y]);
  }
  lineTo(x: number, y: number): void {
    this.record("lineTo", [x, y]);
  }
  arc(x: number, y: number, radius: number): void {
    this.record("arc", [x, y, radius]);
  }
  fill(...args: unknown[]): void {
    this.record("fill", args);
  }
  stroke(...args: unknown[]): void {
    this.record("stroke", args);
  }
  setLineDash(segments: Iterable<number>): void {
    this.record("setLineDash", [[...segments]]);
  }
}

export interface TestSurface {
  surface: RasterSurface;
  ctx: RecordingContext;
  container: HTMLElement;
  /** Change what the next `resize()` measures */
  setSize(width: number, height: number): void;
}

/** A surface in a fresh container, drawing into a RecordingContext */
export function makeSurface(width: number, height: number): TestSurface {
  const container = document.createElement("div");
  document.body.appendChild(container);

  const ctx = new RecordingContext();
  let size = { width, height };
  const surface = createRasterSurface(container, {
    getContext: () => ctx,
    measure: () => size,
    pixelRatio: () => 2,
  });

  return {
    surface,
    ctx,
    container,
    setSize(w, h) {
      size = { width: w, height: h };
    },
  };
}

type MeasurementOverrides = Omit<Partial<Measurement>, "id" | "timestamp" | "levels"> & {
  levels?: Partial<Measurement["levels"]>;
};

export function makeMeasurement(id: string, timestamp: number, overrides: MeasurementOverrides = {}): Measurement {
  const { levels, ...rest } = overrides;
  return {
    id,
    timestamp,
    bands: {},
    spectralCentroid: null,
    spectralFlatness: null,
    dominantFrequency: null,
    silencePercent: null,
    anomalyScore: null,
    annotation: null,
    spectrogram: null,
    ...rest,
    levels: { mean: null, max: null, min: null, l10: null, l50: null, l90: null, ...levels },
  };
}
