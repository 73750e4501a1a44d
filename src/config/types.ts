/**
 * Public configuration and binding types.
 */

/** Color as `[r, g, b, a]`, every channel in [0, 1]. */
export type Rgba01 = readonly [r: number, g: number, b: number, a: number];

/**
 * Color accepted in configuration: a CSS color string (`#rgb`, `#rgba`, `#rrggbb`,
 * `#rrggbbaa`, `rgb()`, `rgba()`) or an {@link Rgba01} tuple.
 */
export type GaugeColorInput = string | Rgba01;

export type GaugeKey = string;

export type GaugeEasingName = 'linear' | 'easeInOut' | 'cubicOut' | 'cubicInOut';

/**
 * Rendered bar owned by the UI layer. The animator only writes through it.
 */
export interface GaugeBinding {
  setValue(value: number): void;
  setMax(max: number): void;
  setFillColor(color: Rgba01): void;
  setOpacity(opacity: number): void;
  /** Value presently displayed, if the sink can report one. */
  getValue?(): number | undefined;
}

export interface CriticalContext {
  readonly key: GaugeKey;
  /** `currentValue / maxValue`, in [0, 1]. */
  readonly fraction: number;
  readonly currentValue: number;
  readonly maxValue: number;
  readonly lowThreshold: number;
  readonly highThreshold: number;
}

/** Decides whether a gauge sits in its critical band (and should pulse). */
export type CriticalPredicate = (context: CriticalContext) => boolean;

export interface GaugeConfig {
  readonly normalColor: GaugeColorInput;
  /** Defaults to `normalColor`. */
  readonly lowColor?: GaugeColorInput;
  /** Defaults to `normalColor`. */
  readonly highColor?: GaugeColorInput;
  /** Fraction in [0, 1] (default: 0.25). */
  readonly lowThreshold?: number;
  /** Fraction in [0, 1] (default: 0.75). */
  readonly highThreshold?: number;
  /** Default: never critical. */
  readonly critical?: CriticalPredicate;
  /** Initial upper bound (default: 100, minimum 1). */
  readonly maxValue?: number;
}

export interface PulseConfig {
  /** Opacity around which the pulse oscillates (default: 0.85). */
  readonly base?: number;
  /** Oscillation amplitude (default: 0.15). */
  readonly amplitude?: number;
  /** Angular frequency in radians per second (default: 2). */
  readonly frequency?: number;
}

export type GaugeLogger = Pick<Console, 'debug' | 'warn' | 'error'>;

export interface GaugeSnapshot {
  readonly key: GaugeKey;
  readonly currentValue: number;
  readonly targetValue: number;
  readonly maxValue: number;
  readonly fraction: number;
  readonly isAnimating: boolean;
}

export interface GaugeAnimatorOptions {
  /** Transition duration in ms (default: 600). */
  readonly duration?: number;
  readonly easing?: GaugeEasingName | ((t: number) => number);
  /** Recompute the fill color on every transition frame (default: true). */
  readonly colorTransitions?: boolean;
  /** Critical-band pulse. `false` disables it (default: enabled). */
  readonly pulse?: boolean | PulseConfig;
  /** Emit debug logs (default: false). */
  readonly verbose?: boolean;
  /** Defaults to `console`. */
  readonly logger?: GaugeLogger;
  /** Called once a transition reaches its target. Not called for cancelled transitions. */
  readonly onSettled?: (snapshot: GaugeSnapshot) => void;
}
