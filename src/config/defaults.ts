import type { PulseConfig, Rgba01 } from './types';

export const defaultAnimatorOptions = {
  duration: 600,
  easing: 'easeInOut',
  colorTransitions: true,
  verbose: false,
} as const;

export const defaultPulse = {
  base: 0.85,
  amplitude: 0.15,
  frequency: 2,
} as const satisfies Required<PulseConfig>;

export const defaultGaugeThresholds = {
  lowThreshold: 0.25,
  highThreshold: 0.75,
} as const;

export const defaultMaxValue = 100;

/** Used when a gauge is created without a usable color. */
export const fallbackColor: Rgba01 = [0, 0, 0, 1];

/** Guards threshold divisions when a threshold sits at 0 or 1. */
export const THRESHOLD_EPSILON = 1e-4;
