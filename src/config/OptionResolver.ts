import type {
  CriticalPredicate,
  GaugeAnimatorOptions,
  GaugeConfig,
  GaugeLogger,
  GaugeSnapshot,
  PulseConfig,
  Rgba01,
} from './types';
import {
  THRESHOLD_EPSILON,
  defaultAnimatorOptions,
  defaultGaugeThresholds,
  defaultMaxValue,
  defaultPulse,
  fallbackColor,
} from './defaults';
import { getEasing } from '../utils/easing';
import type { EasingFunction } from '../utils/easing';
import { resolveColorInput } from '../utils/colors';
import { clamp01, finiteOr } from '../utils/math';
import { neverCritical } from '../gauges/critical';

export type ResolvedPulseConfig = Readonly<Required<PulseConfig>>;

export interface ResolvedGaugeAnimatorOptions {
  readonly durationMs: number;
  readonly easing: EasingFunction;
  readonly colorTransitions: boolean;
  /** null when pulsing is disabled. */
  readonly pulse: ResolvedPulseConfig | null;
  readonly verbose: boolean;
  readonly logger: GaugeLogger;
  readonly onSettled: ((snapshot: GaugeSnapshot) => void) | null;
}

export interface ResolvedGaugeConfig {
  readonly normalColor: Rgba01;
  readonly lowColor: Rgba01;
  readonly highColor: Rgba01;
  readonly lowThreshold: number;
  readonly highThreshold: number;
  readonly critical: CriticalPredicate;
  readonly maxValue: number;
}

/** Upper bounds below 1 (and non-finite ones) become 1 so fractions never divide by zero. */
export const normalizeMax = (max: unknown): number => Math.max(1, finiteOr(max, 1));

/**
 * Brings a threshold pair into `0 <= low < high <= 1`.
 *
 * - Non-finite values take the defaults (0.25 / 0.75).
 * - Out-of-range values are clamped; a reversed pair is swapped.
 * - An equal pair is pulled apart by a small epsilon.
 */
export function normalizeThresholds(
  low: unknown,
  high: unknown
): { readonly lowThreshold: number; readonly highThreshold: number } {
  let lo = clamp01(finiteOr(low, defaultGaugeThresholds.lowThreshold));
  let hi = clamp01(finiteOr(high, defaultGaugeThresholds.highThreshold));

  if (lo > hi) [lo, hi] = [hi, lo];
  if (lo === hi) {
    if (hi < 1) hi = Math.min(1, hi + THRESHOLD_EPSILON);
    else lo = Math.max(0, lo - THRESHOLD_EPSILON);
  }
  return { lowThreshold: lo, highThreshold: hi };
}

const resolvePulse = (input: GaugeAnimatorOptions['pulse']): ResolvedPulseConfig | null => {
  if (input === false) return null;
  const cfg: PulseConfig = input === true || input == null ? {} : input;
  return {
    base: finiteOr(cfg.base, defaultPulse.base),
    amplitude: finiteOr(cfg.amplitude, defaultPulse.amplitude),
    frequency: finiteOr(cfg.frequency, defaultPulse.frequency),
  };
};

export function resolveAnimatorOptions(input: GaugeAnimatorOptions = {}): ResolvedGaugeAnimatorOptions {
  const durationRaw = finiteOr(input.duration, defaultAnimatorOptions.duration);

  return {
    durationMs: Math.max(0, durationRaw),
    easing: getEasing(input.easing ?? defaultAnimatorOptions.easing),
    colorTransitions:
      typeof input.colorTransitions === 'boolean' ? input.colorTransitions : defaultAnimatorOptions.colorTransitions,
    pulse: resolvePulse(input.pulse),
    verbose: typeof input.verbose === 'boolean' ? input.verbose : defaultAnimatorOptions.verbose,
    logger: input.logger ?? console,
    onSettled: typeof input.onSettled === 'function' ? input.onSettled : null,
  };
}

/**
 * Resolves a gauge registration. A missing config yields an opaque black gauge
 * with default thresholds that never pulses.
 */
export function resolveGaugeConfig(input?: Partial<GaugeConfig> | null): ResolvedGaugeConfig {
  const cfg: Partial<GaugeConfig> = input ?? {};
  const normalColor = resolveColorInput(cfg.normalColor, fallbackColor);
  const { lowThreshold, highThreshold } = normalizeThresholds(cfg.lowThreshold, cfg.highThreshold);

  return {
    normalColor,
    lowColor: resolveColorInput(cfg.lowColor, normalColor),
    highColor: resolveColorInput(cfg.highColor, normalColor),
    lowThreshold,
    highThreshold,
    critical: typeof cfg.critical === 'function' ? cfg.critical : neverCritical,
    maxValue: normalizeMax(cfg.maxValue ?? defaultMaxValue),
  };
}

export const OptionResolver = {
  resolveAnimator: resolveAnimatorOptions,
  resolveGauge: resolveGaugeConfig,
} as const;
