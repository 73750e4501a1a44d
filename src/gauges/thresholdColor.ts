import type { Rgba01 } from '../config/types';
import { lerpRgba01 } from '../utils/colors';
import { clamp01 } from '../utils/math';

/**
 * Display color for a gauge at `fraction` of its maximum.
 *
 * - At or below `lowThreshold`: blends lowColor -> normalColor as the fraction rises to the threshold.
 * - At or above `highThreshold`: blends normalColor -> highColor as the fraction rises to 1.
 * - In between: normalColor.
 *
 * Both branches yield normalColor at their threshold, so the mapping is continuous
 * for any `0 <= lowThreshold < highThreshold <= 1`. A threshold sitting on 0 or 1
 * leaves an empty band, which maps to normalColor instead of dividing by zero.
 */
export function computeThresholdColor(
  fraction: number,
  lowThreshold: number,
  highThreshold: number,
  lowColor: Rgba01,
  normalColor: Rgba01,
  highColor: Rgba01
): Rgba01 {
  const f = Number.isFinite(fraction) ? fraction : 0;

  if (f <= lowThreshold) {
    const t = lowThreshold > 0 ? clamp01(f / lowThreshold) : 1;
    return lerpRgba01(lowColor, normalColor, t);
  }
  if (f >= highThreshold) {
    const t = highThreshold < 1 ? clamp01((f - highThreshold) / (1 - highThreshold)) : 0;
    return lerpRgba01(normalColor, highColor, t);
  }
  return normalColor;
}
