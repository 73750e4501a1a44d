import type { GaugeEasingName } from '../config/types';
import { clamp01 } from './math';

export type EasingFunction = (t: number) => number;

export function easeLinear(t: number): number {
  return clamp01(t);
}

/**
 * Hermite smoothstep (`3t^2 - 2t^3`): zero slope at both ends.
 * Default curve for gauge transitions.
 */
export function easeInOut(t: number): number {
  const x = clamp01(t);
  return x * x * (3 - 2 * x);
}

export function easeCubicOut(t: number): number {
  const x = clamp01(t);
  const inv = 1 - x;
  return 1 - inv * inv * inv;
}

export function easeCubicInOut(t: number): number {
  const x = clamp01(t);
  if (x < 0.5) return 4 * x * x * x;
  const y = -2 * x + 2;
  return 1 - (y * y * y) / 2;
}

/**
 * Resolves an easing by name or passes a custom function through.
 * Unknown names fall back to linear.
 */
export function getEasing(name: GaugeEasingName | EasingFunction | null | undefined): EasingFunction {
  if (typeof name === 'function') return name;
  switch (name) {
    case 'linear':
      return easeLinear;
    case 'easeInOut':
      return easeInOut;
    case 'cubicOut':
      return easeCubicOut;
    case 'cubicInOut':
      return easeCubicInOut;
    default:
      return easeLinear;
  }
}
