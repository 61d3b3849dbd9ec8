import { describe, expect, it } from "vitest";

import {
  colorAt,
  isPaletteName,
  LUT_SIZE,
  lutColor,
  PALETTE_NAMES,
  PALETTES,
  paletteLut,
  parseHexColor,
  rgbToCss,
} from "../src/index";

describe("color mapper", () => {
  it("maps the ends of the range to the first and last anchors", () => {
    expect(colorAt(0, PALETTES.viridis)).toEqual([68, 1, 84]);
    expect(colorAt(1, PALETTES.viridis)).toEqual([253, 231, 37]);
    expect(colorAt(0, PALETTES.grayscale)).toEqual([0, 0, 0]);
    expect(colorAt(1, PALETTES.grayscale)).toEqual([255, 255, 255]);
  });

  it("clamps out-of-range and non-finite input", () => {
    expect(colorAt(-3, PALETTES.plasma)).toEqual(colorAt(0, PALETTES.plasma));
    expect(colorAt(7, PALETTES.plasma)).toEqual(colorAt(1, PALETTES.plasma));
    expect(colorAt(Number.NaN, PALETTES.plasma)).toEqual([13, 8, 135]);
  });

  it("interpolates between neighbouring anchors", () => {
    // Halfway between #707070 and #8c8c8c
    expect(colorAt(0.5, PALETTES.grayscale)).toEqual([126, 126, 126]);
  });

  it("has no jumps along any palette", () => {
    for (const name of PALETTE_NAMES) {
      const palette = PALETTES[name];
      let prev = colorAt(0, palette);
      for (let i = 1; i <= 1000; i++) {
        const next = colorAt(i / 1000, palette);
        for (let c = 0; c < 3; c++) {
          expect(Math.abs((next[c] ?? 0) - (prev[c] ?? 0))).toBeLessThanOrEqual(2);
        }
        prev = next;
      }
    }
  });

  it("runs every palette from dark to light", () => {
    const brightness = (rgb: readonly number[]) => rgb.reduce((a, b) => a + b, 0);
    for (const name of PALETTE_NAMES) {
      expect(brightness(colorAt(0, PALETTES[name]))).toBeLessThan(brightness(colorAt(1, PALETTES[name])));
    }
  });

  it("formats CSS colors", () => {
    expect(rgbToCss([1, 2, 3])).toBe("rgb(1, 2, 3)");
  });

  it("recognises palette names", () => {
    expect(isPaletteName("magma")).toBe(true);
    expect(isPaletteName("rainbow")).toBe(false);
  });

  it("parses short and long hex colors", () => {
    expect(parseHexColor("#fde725")).toEqual([253, 231, 37]);
    expect(parseHexColor("#fff")).toEqual([255, 255, 255]);
    expect(parseHexColor("teal")).toBeNull();
  });
});

describe("palette lookup tables", () => {
  it("samples each palette into a cached 256-entry table", () => {
    const lut = paletteLut("grayscale");

    expect(lut).toHaveLength(LUT_SIZE);
    expect(lut[0]).toBe("rgb(0, 0, 0)");
    expect(lut[255]).toBe("rgb(255, 255, 255)");
    expect(paletteLut("grayscale")).toBe(lut);
  });

  it("looks up clamped positions", () => {
    const lut = paletteLut("viridis");

    expect(lutColor(lut, 0)).toBe("rgb(68, 1, 84)");
    expect(lutColor(lut, 1)).toBe("rgb(253, 231, 37)");
    expect(lutColor(lut, 2)).toBe(lut[255]);
    expect(lutColor(lut, Number.NaN)).toBe(lut[0]);
  });
});
