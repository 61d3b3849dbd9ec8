/**
 * Small numeric, search and formatting helpers shared by the renderers
 */

import type { Rgb } from "./types.js";

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/**
 * First index whose value is >= `target` in ascending `sorted`
 * (`sorted.length` when there is none)
 */
export function lowerBound(sorted: ArrayLike<number>, target: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if ((sorted[mid] ?? Infinity) < target) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/**
 * First index whose value is > `target` in ascending `sorted`
 * (`sorted.length` when there is none)
 */
export function upperBound(sorted: ArrayLike<number>, target: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if ((sorted[mid] ?? Infinity) <= target) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/**
 * Half-open index range `[from, to)` of the times inside `[start, end]`
 */
export function findTimeRange(times: ArrayLike<number>, start: number, end: number): [number, number] {
  return [lowerBound(times, start), upperBound(times, end)];
}

const HEX_COLOR = /^#([0-9a-f]{3}|[0-9a-f]{6})$/i;

/** `#rgb` or `#rrggbb` to channel values; null for anything else */
export function parseHexColor(color: string): Rgb | null {
  const digits = HEX_COLOR.exec(color)?.[1];
  if (!digits) return null;
  const full = digits.length === 3 ? digits.replace(/./g, "$&$&") : digits;
  const channel = (i: number) => parseInt(full.slice(i * 2, i * 2 + 2), 16);
  return [channel(0), channel(1), channel(2)];
}

const TWO_DAYS_MS = 2 * 86_400_000;

/** UTC axis label: `MM-DD` for spans over two days, `HH:MM` otherwise */
export function formatTimeLabel(ms: number, spanMs: number): string {
  const iso = new Date(ms).toISOString();
  return spanMs > TWO_DAYS_MS ? iso.slice(5, 10) : iso.slice(11, 16);
}
