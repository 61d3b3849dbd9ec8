/**
 * Color mapper
 *
 * Palettes are ordered lists of RGB anchors. `colorAt` interpolates
 * linearly between neighbouring anchors; callers normalize a raw dB value
 * into [0, 1] against the display range first. Switching palette only
 * changes this lookup, never the range.
 */

import { z } from "zod";

import paletteAnchors from "./palettes.json";
import type { Rgb } from "./types.js";
import { clamp, lerp, parseHexColor } from "./utils.js";

export const PALETTE_NAMES = ["viridis", "plasma", "inferno", "magma", "grayscale"] as const;

export type PaletteName = (typeof PALETTE_NAMES)[number];

export type Palette = readonly Rgb[];

const hexAnchor = z.string().transform((hex, ctx): Rgb => {
  const rgb = parseHexColor(hex);
  if (!rgb) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid anchor color ${hex}` });
    return z.NEVER;
  }
  return rgb;
});

const anchors = z.array(hexAnchor).min(2);

const paletteFileSchema = z.object({
  viridis: anchors,
  plasma: anchors,
  inferno: anchors,
  magma: anchors,
  grayscale: anchors,
});

/** Named palette presets, dark to light */
export const PALETTES: Readonly<Record<PaletteName, Palette>> = paletteFileSchema.parse(paletteAnchors);

export function isPaletteName(name: string): name is PaletteName {
  return PALETTE_NAMES.some((p) => p === name);
}

/**
 * Color at normalized position `t` of a palette.
 *
 * `t` is clamped to [0, 1]; 0 and 1 return the first and last anchors.
 */
export function colorAt(t: number, palette: Palette): Rgb {
  const first = palette[0];
  if (!first) return [0, 0, 0];

  const clampedT = Number.isFinite(t) ? clamp(t, 0, 1) : 0;
  const idx = clampedT * (palette.length - 1);
  const lower = Math.floor(idx);
  const upper = Math.ceil(idx);
  const weight = idx - lower;

  const a = palette[lower] ?? first;
  const b = palette[upper] ?? a;

  return [
    Math.round(lerp(a[0], b[0], weight)),
    Math.round(lerp(a[1], b[1], weight)),
    Math.round(lerp(a[2], b[2], weight)),
  ];
}

export function rgbToCss(rgb: Rgb): string {
  return `rgb(${rgb[0]}, ${rgb[1]}, ${rgb[2]})`;
}

export const LUT_SIZE = 256;

const lutCache = new Map<PaletteName, readonly string[]>();

/**
 * 256 CSS colors sampled evenly along a palette, cached per palette.
 */
export function paletteLut(name: PaletteName): readonly string[] {
  const cached = lutCache.get(name);
  if (cached) return cached;

  const palette = PALETTES[name];
  const lut: string[] = [];
  for (let i = 0; i < LUT_SIZE; i++) {
    lut.push(rgbToCss(colorAt(i / (LUT_SIZE - 1), palette)));
  }
  lutCache.set(name, lut);
  return lut;
}

/** CSS color for normalized `t` from a lookup table */
export function lutColor(lut: readonly string[], t: number): string {
  const idx = Math.round(clamp(Number.isFinite(t) ? t : 0, 0, 1) * (lut.length - 1));
  return lut[idx] ?? lut[0] ?? "#000";
}
