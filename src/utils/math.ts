/**
 * Clamps value to [0, 1] range. NaN maps to 0.
 */
export const clamp01 = (v: number): number => {
  if (Number.isNaN(v)) return 0;
  if (v <= 0) return 0;
  if (v >= 1) return 1;
  return v;
};

export const clamp = (v: number, min: number, max: number): number => Math.max(min, Math.min(max, v));

/**
 * Linear interpolation between two values with clamped t.
 *
 * @param a - Start value
 * @param b - End value
 * @param t01 - Interpolation parameter in range [0, 1]
 */
export const lerp = (a: number, b: number, t01: number): number => a + (b - a) * clamp01(t01);

export const finiteOr = (v: unknown, fallback: number): number =>
  typeof v === 'number' && Number.isFinite(v) ? v : fallback;
