/**
 * stat-gauges - animated stat bars driven by a single frame clock
 */

export const version = '0.1.0';

// Gauge animator
export { createGaugeAnimator } from './gauges/createGaugeAnimator';
export type { GaugeAnimator } from './gauges/createGaugeAnimator';
export { computeThresholdColor } from './gauges/thresholdColor';
export { createPulseOverseer, computePulseOpacity } from './gauges/createPulseOverseer';
export type { PulseGauge, PulseOverseer, PulseOverseerOptions } from './gauges/createPulseOverseer';
export { criticalWhenHigh, criticalWhenLow, neverCritical } from './gauges/critical';

export type {
  CriticalContext,
  CriticalPredicate,
  GaugeAnimatorOptions,
  GaugeBinding,
  GaugeColorInput,
  GaugeConfig,
  GaugeEasingName,
  GaugeKey,
  GaugeLogger,
  GaugeSnapshot,
  PulseConfig,
  Rgba01,
} from './config/types';

// Options defaults + resolution
export { defaultAnimatorOptions, defaultGaugeThresholds, defaultPulse } from './config/defaults';
export {
  OptionResolver,
  normalizeMax,
  normalizeThresholds,
  resolveAnimatorOptions,
  resolveGaugeConfig,
} from './config/OptionResolver';
export type {
  ResolvedGaugeAnimatorOptions,
  ResolvedGaugeConfig,
  ResolvedPulseConfig,
} from './config/OptionResolver';

// Frame clock + task scheduling
export { createAnimationFrameClock, createManualFrameClock } from './core/FrameClock';
export type {
  AnimationFrameClockOptions,
  FrameCallback,
  FrameClock,
  FrameInfo,
  ManualFrameClock,
} from './core/FrameClock';
export { createTaskScheduler } from './core/createTaskScheduler';
export type { FrameTask, TaskId, TaskScheduler, TaskSchedulerOptions } from './core/createTaskScheduler';

// Bindings
export { createDomGaugeBinding } from './bindings/createDomGaugeBinding';
export type { DomGaugeBinding, DomGaugeBindingOptions } from './bindings/createDomGaugeBinding';

// Stat presets
export {
  registerStatGauges,
  statColors,
  statGaugeKeys,
  statGaugePresets,
  syncStatGauges,
} from './presets/statGauges';
export type { StatBlock, StatGaugeKey } from './presets/statGauges';

// Utilities
export { easeCubicInOut, easeCubicOut, easeInOut, easeLinear, getEasing } from './utils/easing';
export type { EasingFunction } from './utils/easing';
export {
  brightenColor,
  lerpRgba01,
  multiplyColor,
  parseCssColorToRgba01,
  resolveColorInput,
  rgba01ToCssRgba,
} from './utils/colors';
export { clamp, clamp01, lerp } from './utils/math';
