import type { GaugeColorInput, Rgba01 } from '../config/types';
import { clamp01, lerp } from './math';

const HEX_RE = /^#([0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;
const RGB_FN_RE = /^rgba?\(\s*([^)]*)\)$/i;

const parseHex = (hex: string): Rgba01 | null => {
  const m = HEX_RE.exec(hex);
  if (!m || m[1] === undefined) return null;
  let digits = m[1];
  if (digits.length <= 4) {
    digits = Array.from(digits, (c) => c + c).join('');
  }
  const channel = (i: number): number => parseInt(digits.slice(i * 2, i * 2 + 2), 16) / 255;
  const a = digits.length === 8 ? channel(3) : 1;
  return [channel(0), channel(1), channel(2), a];
};

const parseChannel255 = (raw: string): number | null => {
  const s = raw.trim();
  if (s.endsWith('%')) {
    const pct = Number(s.slice(0, -1));
    return Number.isFinite(pct) ? clamp01(pct / 100) : null;
  }
  const n = Number(s);
  return s.length > 0 && Number.isFinite(n) ? clamp01(n / 255) : null;
};

const parseAlpha = (raw: string): number | null => {
  const s = raw.trim();
  if (s.endsWith('%')) {
    const pct = Number(s.slice(0, -1));
    return Number.isFinite(pct) ? clamp01(pct / 100) : null;
  }
  const n = Number(s);
  return s.length > 0 && Number.isFinite(n) ? clamp01(n) : null;
};

const parseRgbFunction = (css: string): Rgba01 | null => {
  const m = RGB_FN_RE.exec(css);
  if (!m || m[1] === undefined) return null;
  // Accept both `rgb(1, 2, 3)` and `rgb(1 2 3 / 0.5)`.
  const parts = m[1]
    .split(/[\s,/]+/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
  if (parts.length !== 3 && parts.length !== 4) return null;

  const [rs, gs, bs, as] = parts;
  if (rs === undefined || gs === undefined || bs === undefined) return null;
  const r = parseChannel255(rs);
  const g = parseChannel255(gs);
  const b = parseChannel255(bs);
  const a = as === undefined ? 1 : parseAlpha(as);
  if (r === null || g === null || b === null || a === null) return null;
  return [r, g, b, a];
};

/**
 * Parses a CSS color string into RGBA channels in [0, 1].
 * Supports hex (`#rgb`, `#rgba`, `#rrggbb`, `#rrggbbaa`) and `rgb()` / `rgba()`.
 *
 * @returns The parsed color, or null if the string is not a supported format
 */
export function parseCssColorToRgba01(css: string): Rgba01 | null {
  const s = css.trim();
  if (s.length === 0) return null;
  if (s.startsWith('#')) return parseHex(s);
  return parseRgbFunction(s);
}

const isRgba01Tuple = (v: unknown): v is Rgba01 =>
  Array.isArray(v) && v.length === 4 && v.every((c) => typeof c === 'number' && Number.isFinite(c));

/**
 * Normalizes a configured color. Tuples are clamped per channel, strings are parsed.
 * Anything unusable yields `fallback`.
 */
export function resolveColorInput(input: GaugeColorInput | null | undefined, fallback: Rgba01): Rgba01 {
  if (typeof input === 'string') return parseCssColorToRgba01(input) ?? fallback;
  if (isRgba01Tuple(input)) {
    return [clamp01(input[0]), clamp01(input[1]), clamp01(input[2]), clamp01(input[3])];
  }
  return fallback;
}

export const rgba01ToCssRgba = (rgba: Rgba01): string => {
  const r = Math.max(0, Math.min(255, Math.round(rgba[0] * 255)));
  const g = Math.max(0, Math.min(255, Math.round(rgba[1] * 255)));
  const b = Math.max(0, Math.min(255, Math.round(rgba[2] * 255)));
  const a = Math.max(0, Math.min(1, rgba[3]));
  return `rgba(${r},${g},${b},${a})`;
};

/** Per-channel linear interpolation (alpha included), t clamped to [0, 1]. */
export const lerpRgba01 = (from: Rgba01, to: Rgba01, t01: number): Rgba01 => [
  lerp(from[0], to[0], t01),
  lerp(from[1], to[1], t01),
  lerp(from[2], to[2], t01),
  lerp(from[3], to[3], t01),
];

/** Scales RGB by `factor` (alpha untouched). Results below 1 darken; channels are not clamped. */
export const multiplyColor = (color: Rgba01, factor: number): Rgba01 => [
  color[0] * factor,
  color[1] * factor,
  color[2] * factor,
  color[3],
];

/** Scales RGB by `factor` and clamps each channel to [0, 1]. */
export const brightenColor = (color: Rgba01, factor: number): Rgba01 => [
  clamp01(color[0] * factor),
  clamp01(color[1] * factor),
  clamp01(color[2] * factor),
  color[3],
];

export const isSameRgba01 = (a: Rgba01, b: Rgba01, epsilon = 1e-6): boolean =>
  Math.abs(a[0] - b[0]) <= epsilon &&
  Math.abs(a[1] - b[1]) <= epsilon &&
  Math.abs(a[2] - b[2]) <= epsilon &&
  Math.abs(a[3] - b[3]) <= epsilon;
