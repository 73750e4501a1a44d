import type {
  GaugeAnimatorOptions,
  GaugeBinding,
  GaugeConfig,
  GaugeKey,
  GaugeSnapshot,
} from '../config/types';
import { normalizeMax, resolveAnimatorOptions, resolveGaugeConfig } from '../config/OptionResolver';
import type { ResolvedGaugeConfig } from '../config/OptionResolver';
import type { FrameClock } from '../core/FrameClock';
import { createTaskScheduler } from '../core/createTaskScheduler';
import type { TaskId } from '../core/createTaskScheduler';
import { clamp, clamp01, finiteOr, lerp } from '../utils/math';
import { computeThresholdColor } from './thresholdColor';
import { createPulseOverseer } from './createPulseOverseer';
import type { PulseGauge, PulseOverseer } from './createPulseOverseer';

export interface GaugeAnimator {
  /**
   * Registers (or replaces) a gauge. Seeds its value from `binding.getValue()`.
   * Does not start a transition.
   *
   * @returns false if the key is empty or the binding is missing (nothing registered)
   */
  register(key: GaugeKey, binding: GaugeBinding, config: GaugeConfig): boolean;
  /**
   * Eases the gauge toward `value` (clamped to `[0, max]`, `max` clamped to `>= 1`).
   * Replaces any transition in flight for this key.
   */
  setTarget(key: GaugeKey, value: number, max: number): void;
  /** Cancels the gauge's transition and forgets it. Unknown keys are ignored. */
  unregister(key: GaugeKey): void;
  getSnapshot(key: GaugeKey): GaugeSnapshot | null;
  has(key: GaugeKey): boolean;
  keys(): GaugeKey[];
  /** With a key: whether that gauge is mid-transition. Without: whether any gauge is. */
  isAnimating(key?: GaugeKey): boolean;
  /** Cancels every transition and the pulse, then drops all gauges. Idempotent. */
  dispose(): void;
}

interface GaugeAnimationState {
  readonly key: GaugeKey;
  readonly binding: GaugeBinding | null;
  readonly config: ResolvedGaugeConfig;
  currentValue: number;
  targetValue: number;
  maxValue: number;
  isAnimating: boolean;
  transitionId: TaskId | null;
}

const normalizeKey = (key: unknown): GaugeKey | null => {
  if (typeof key !== 'string') return null;
  return key.trim().length > 0 ? key : null;
};

const fractionOf = (state: GaugeAnimationState): number =>
  state.maxValue > 0 ? clamp01(state.currentValue / state.maxValue) : 0;

const toSnapshot = (state: GaugeAnimationState): GaugeSnapshot => ({
  key: state.key,
  currentValue: state.currentValue,
  targetValue: state.targetValue,
  maxValue: state.maxValue,
  fraction: fractionOf(state),
  isAnimating: state.isAnimating,
});

/**
 * Drives a set of named gauges off one frame clock.
 *
 * Each `setTarget` cancels the key's previous transition before scheduling a new one,
 * so at most one task ever writes a given gauge's value and color. The pulse task
 * starts with the first registration and writes opacity only.
 */
export function createGaugeAnimator(clock: FrameClock, options: GaugeAnimatorOptions = {}): GaugeAnimator {
  const resolved = resolveAnimatorOptions(options);
  const { logger } = resolved;
  const durationSeconds = resolved.durationMs / 1000;

  const scheduler = createTaskScheduler(clock, { logger });
  const states = new Map<GaugeKey, GaugeAnimationState>();
  const warnedBindingKeys = new Set<GaugeKey>();
  let warnedDisposed = false;
  let disposed = false;

  const debug = (message: string): void => {
    if (resolved.verbose) logger.debug(`[GaugeAnimator] ${message}`);
  };

  const warnDisposed = (method: string): void => {
    if (warnedDisposed) return;
    warnedDisposed = true;
    logger.warn(`[GaugeAnimator] ${method}() called after dispose(); ignoring.`);
  };

  const writeBinding = (state: GaugeAnimationState, write: (binding: GaugeBinding) => void): void => {
    if (state.binding === null) return;
    try {
      write(state.binding);
    } catch (error) {
      if (warnedBindingKeys.has(state.key)) return;
      warnedBindingKeys.add(state.key);
      logger.error(`[GaugeAnimator] binding for "${state.key}" threw while rendering:`, error);
    }
  };

  const renderState = (state: GaugeAnimationState): void => {
    writeBinding(state, (b) => {
      b.setMax(state.maxValue);
      b.setValue(state.currentValue);
    });
    if (!resolved.colorTransitions) return;
    const { config } = state;
    const color = computeThresholdColor(
      fractionOf(state),
      config.lowThreshold,
      config.highThreshold,
      config.lowColor,
      config.normalColor,
      config.highColor
    );
    writeBinding(state, (b) => b.setFillColor(color));
  };

  const pulseGauges = (): PulseGauge[] => {
    const out: PulseGauge[] = [];
    for (const state of Array.from(states.values())) {
      if (state.binding === null) continue;
      out.push({
        key: state.key,
        fraction: fractionOf(state),
        currentValue: state.currentValue,
        maxValue: state.maxValue,
        lowThreshold: state.config.lowThreshold,
        highThreshold: state.config.highThreshold,
        critical: state.config.critical,
        setOpacity: (opacity) => writeBinding(state, (b) => b.setOpacity(opacity)),
      });
    }
    return out;
  };

  const pulse: PulseOverseer | null =
    resolved.pulse === null ? null : createPulseOverseer(scheduler, pulseGauges, resolved.pulse, { logger });

  const cancelTransition = (state: GaugeAnimationState): void => {
    if (state.transitionId === null) return;
    scheduler.cancel(state.transitionId);
    state.transitionId = null;
    state.isAnimating = false;
  };

  const settle = (state: GaugeAnimationState): void => {
    state.currentValue = state.targetValue;
    renderState(state);
    state.isAnimating = false;
    state.transitionId = null;
    debug(`"${state.key}" settled at ${state.targetValue}/${state.maxValue}`);

    if (resolved.onSettled === null) return;
    try {
      resolved.onSettled(toSnapshot(state));
    } catch (error) {
      logger.error(`[GaugeAnimator] onSettled callback threw for "${state.key}":`, error);
    }
  };

  const startTransition = (state: GaugeAnimationState): void => {
    cancelTransition(state);

    const startValue = state.currentValue;
    let elapsedSeconds = 0;
    state.isAnimating = true;

    state.transitionId = scheduler.schedule({
      step(frame) {
        elapsedSeconds += frame.deltaSeconds;
        const progress = durationSeconds > 0 ? clamp01(elapsedSeconds / durationSeconds) : 1;

        if (progress >= 1) {
          settle(state);
          return false;
        }

        state.currentValue = lerp(startValue, state.targetValue, resolved.easing(progress));
        renderState(state);
        return true;
      },
    });
  };

  const register: GaugeAnimator['register'] = (key, binding, config) => {
    if (disposed) {
      warnDisposed('register');
      return false;
    }
    const normalizedKey = normalizeKey(key);
    if (normalizedKey === null) {
      logger.warn('[GaugeAnimator] register() ignored: gauge key must be a non-empty string.');
      return false;
    }
    if (binding == null) {
      logger.warn(`[GaugeAnimator] register("${normalizedKey}") ignored: binding is required.`);
      return false;
    }

    const existing = states.get(normalizedKey);
    if (existing) cancelTransition(existing);

    const resolvedConfig = resolveGaugeConfig(config);
    let initialValue = 0;
    try {
      initialValue = finiteOr(binding.getValue?.(), 0);
    } catch (error) {
      logger.warn(`[GaugeAnimator] getValue() for "${normalizedKey}" threw; starting at 0.`, error);
    }

    const state: GaugeAnimationState = {
      key: normalizedKey,
      binding,
      config: resolvedConfig,
      currentValue: clamp(initialValue, 0, resolvedConfig.maxValue),
      targetValue: 0,
      maxValue: resolvedConfig.maxValue,
      isAnimating: false,
      transitionId: null,
    };
    state.targetValue = state.currentValue;
    states.set(normalizedKey, state);
    warnedBindingKeys.delete(normalizedKey);

    const initialColor = resolved.colorTransitions
      ? computeThresholdColor(
          fractionOf(state),
          resolvedConfig.lowThreshold,
          resolvedConfig.highThreshold,
          resolvedConfig.lowColor,
          resolvedConfig.normalColor,
          resolvedConfig.highColor
        )
      : resolvedConfig.normalColor;
    writeBinding(state, (b) => b.setFillColor(initialColor));

    pulse?.start();
    debug(`registered "${normalizedKey}" at ${state.currentValue}/${state.maxValue}`);
    return true;
  };

  const setTarget: GaugeAnimator['setTarget'] = (key, value, max) => {
    if (disposed) {
      warnDisposed('setTarget');
      return;
    }
    const normalizedKey = normalizeKey(key);
    if (normalizedKey === null) {
      logger.warn('[GaugeAnimator] setTarget() ignored: gauge key must be a non-empty string.');
      return;
    }

    const maxValue = normalizeMax(max);
    const targetValue = clamp(finiteOr(value, 0), 0, maxValue);

    let state = states.get(normalizedKey);
    if (!state) {
      debug(`setTarget("${normalizedKey}") on an unregistered gauge; creating it without a binding.`);
      state = {
        key: normalizedKey,
        binding: null,
        config: resolveGaugeConfig(null),
        currentValue: targetValue,
        targetValue,
        maxValue,
        isAnimating: false,
        transitionId: null,
      };
      states.set(normalizedKey, state);
    }

    state.targetValue = targetValue;
    state.maxValue = maxValue;
    startTransition(state);
  };

  const unregister: GaugeAnimator['unregister'] = (key) => {
    const state = states.get(key);
    if (!state) return;
    cancelTransition(state);
    states.delete(key);
    warnedBindingKeys.delete(key);
    debug(`unregistered "${key}"`);
  };

  const getSnapshot: GaugeAnimator['getSnapshot'] = (key) => {
    const state = states.get(key);
    return state ? toSnapshot(state) : null;
  };

  const isAnimating: GaugeAnimator['isAnimating'] = (key) => {
    if (key !== undefined) return states.get(key)?.isAnimating ?? false;
    for (const state of states.values()) {
      if (state.isAnimating) return true;
    }
    return false;
  };

  const dispose: GaugeAnimator['dispose'] = () => {
    if (disposed) return;
    disposed = true;
    // Stop every writer before the bindings are released.
    pulse?.stop();
    for (const state of states.values()) cancelTransition(state);
    scheduler.dispose();
    states.clear();
    warnedBindingKeys.clear();
    debug('disposed');
  };

  return {
    register,
    setTarget,
    unregister,
    getSnapshot,
    has: (key) => states.has(key),
    keys: () => Array.from(states.keys()),
    isAnimating,
    dispose,
  };
}
