import { describe, it, expect, vi } from 'vitest';
import { createGaugeAnimator } from '../createGaugeAnimator';
import type { GaugeAnimator } from '../createGaugeAnimator';
import { createManualFrameClock } from '../../core/FrameClock';
import type { ManualFrameClock } from '../../core/FrameClock';
import { criticalWhenLow } from '../critical';
import type { GaugeAnimatorOptions, GaugeBinding, Rgba01 } from '../../config/types';

// --- helpers -----------------------------------------------------------

type RecordingBinding = GaugeBinding & {
  values: number[];
  maxes: number[];
  colors: Rgba01[];
  opacities: number[];
};

function createRecordingBinding(displayed?: number): RecordingBinding {
  const values: number[] = [];
  const maxes: number[] = [];
  const colors: Rgba01[] = [];
  const opacities: number[] = [];
  return {
    values,
    maxes,
    colors,
    opacities,
    setValue: (v) => {
      values.push(v);
    },
    setMax: (m) => {
      maxes.push(m);
    },
    setFillColor: (c) => {
      colors.push(c);
    },
    setOpacity: (o) => {
      opacities.push(o);
    },
    getValue: () => displayed,
  };
}

function createMockLogger() {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const RED: Rgba01 = [0.86, 0.2, 0.2, 1];
const DARK_RED: Rgba01 = [0.55, 0, 0, 1];

const last = <T,>(items: ReadonlyArray<T>): T | undefined => items[items.length - 1];

const expectColorClose = (actual: Rgba01 | undefined, expected: Rgba01): void => {
  expect(actual).toBeDefined();
  if (actual === undefined) return;
  for (let i = 0; i < 4; i++) {
    expect(actual[i]).toBeCloseTo(expected[i] ?? Number.NaN, 9);
  }
};

/** 500 ms linear transitions advanced in 125 ms frames: every step is an exact quarter. */
function setup(options: GaugeAnimatorOptions = {}): {
  clock: ManualFrameClock;
  animator: GaugeAnimator;
  logger: ReturnType<typeof createMockLogger>;
} {
  const clock = createManualFrameClock();
  const logger = createMockLogger();
  const animator = createGaugeAnimator(clock, {
    duration: 500,
    easing: 'linear',
    pulse: false,
    logger,
    ...options,
  });
  return { clock, animator, logger };
}

// --- registration -------------------------------------------------------

describe('createGaugeAnimator - register', () => {
  it('seeds the gauge from the binding without starting a transition', () => {
    const { animator } = setup();
    const binding = createRecordingBinding(40);

    expect(animator.register('energy', binding, { normalColor: '#3399dd' })).toBe(true);

    expect(animator.getSnapshot('energy')).toEqual({
      key: 'energy',
      currentValue: 40,
      targetValue: 40,
      maxValue: 100,
      fraction: 0.4,
      isAnimating: false,
    });
    expect(binding.values).toEqual([]);
    expect(binding.colors).toHaveLength(1);
    expect(animator.isAnimating('energy')).toBe(false);
  });

  it('starts at 0 when the binding cannot report a value', () => {
    const { animator } = setup();
    animator.register('magic', createRecordingBinding(undefined), { normalColor: '#000' });
    animator.register('friendship', createRecordingBinding(Number.NaN), { normalColor: '#000' });

    expect(animator.getSnapshot('magic')?.currentValue).toBe(0);
    expect(animator.getSnapshot('friendship')?.currentValue).toBe(0);
  });

  it('clamps the seeded value into the configured range', () => {
    const { animator } = setup();
    animator.register('health', createRecordingBinding(500), { normalColor: '#000', maxValue: 200 });
    expect(animator.getSnapshot('health')).toMatchObject({ currentValue: 200, maxValue: 200 });
  });

  it('ignores empty keys and missing bindings', () => {
    const { animator, logger } = setup();

    expect(animator.register('', createRecordingBinding(), { normalColor: '#000' })).toBe(false);
    expect(animator.register('   ', createRecordingBinding(), { normalColor: '#000' })).toBe(false);
    expect(animator.register('health', null as unknown as GaugeBinding, { normalColor: '#000' })).toBe(false);

    expect(animator.keys()).toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(3);
  });

  it('re-registering replaces the state and cancels the running transition', () => {
    const { clock, animator } = setup();
    const first = createRecordingBinding(0);
    animator.register('health', first, { normalColor: '#000' });
    animator.setTarget('health', 80, 100);
    clock.tick(0.125);

    const second = createRecordingBinding(55);
    animator.register('health', second, { normalColor: '#000' });
    clock.tick(0.125);
    clock.tick(1);

    expect(first.values).toEqual([20]);
    expect(second.values).toEqual([]);
    expect(animator.getSnapshot('health')).toMatchObject({ currentValue: 55, isAnimating: false });
  });
});

// --- transitions --------------------------------------------------------

describe('createGaugeAnimator - setTarget transitions', () => {
  it('interpolates each frame and finishes exactly on the target', () => {
    const { clock, animator } = setup();
    const binding = createRecordingBinding(0);
    animator.register('health', binding, { normalColor: '#000' });

    animator.setTarget('health', 80, 100);
    expect(animator.isAnimating('health')).toBe(true);

    clock.advance(4, 0.125);

    expect(binding.values).toEqual([20, 40, 60, 80]);
    expect(binding.maxes).toEqual([100, 100, 100, 100]);
    expect(animator.getSnapshot('health')).toMatchObject({ currentValue: 80, targetValue: 80, isAnimating: false });

    clock.advance(3, 0.125);
    expect(binding.values).toHaveLength(4);
  });

  it('converges with no residue under the default curve and uneven frames', () => {
    const { clock, animator } = setup({ easing: 'easeInOut', duration: 600 });
    const binding = createRecordingBinding(90);
    animator.register('magic', binding, { normalColor: '#000' });

    animator.setTarget('magic', 33.3, 100);
    for (let i = 0; i < 50; i++) clock.tick(0.0167);

    expect(animator.getSnapshot('magic')?.currentValue).toBe(33.3);
    expect(last(binding.values)).toBe(33.3);
  });

  it('moves monotonically toward the target', () => {
    const { clock, animator } = setup({ easing: 'easeInOut' });
    const binding = createRecordingBinding(100);
    animator.register('health', binding, { normalColor: '#000' });

    animator.setTarget('health', 10, 100);
    clock.advance(40, 0.016);

    for (let i = 1; i < binding.values.length; i++) {
      expect(binding.values[i]).toBeLessThanOrEqual(binding.values[i - 1] ?? Number.NaN);
    }
    expect(last(binding.values)).toBe(10);
  });

  it('a superseding target cancels the previous transition before its terminal write', () => {
    const onSettled = vi.fn();
    const { clock, animator } = setup({ onSettled });
    const binding = createRecordingBinding(0);
    animator.register('health', binding, { normalColor: '#000' });

    animator.setTarget('health', 80, 100);
    clock.tick(0.125);
    animator.setTarget('health', 10, 100);
    clock.advance(6, 0.125);

    expect(binding.values).toEqual([20, 17.5, 15, 12.5, 10]);
    expect(onSettled).toHaveBeenCalledTimes(1);
    expect(onSettled).toHaveBeenCalledWith({
      key: 'health',
      currentValue: 10,
      targetValue: 10,
      maxValue: 100,
      fraction: 0.1,
      isAnimating: false,
    });
  });

  it('back-to-back targets in the same frame only ever reach the last one', () => {
    const { clock, animator } = setup();
    const binding = createRecordingBinding(0);
    animator.register('energy', binding, { normalColor: '#000' });

    animator.setTarget('energy', 80, 100);
    animator.setTarget('energy', 10, 100);
    clock.advance(6, 0.125);

    expect(binding.values).toEqual([2.5, 5, 7.5, 10]);
    expect(binding.values).not.toContain(80);
  });

  it('clamps values into [0, max] and max to at least 1', () => {
    const { clock, animator } = setup();
    animator.register('health', createRecordingBinding(50), { normalColor: '#000' });

    animator.setTarget('health', 150, 100);
    clock.tick(1);
    expect(animator.getSnapshot('health')).toMatchObject({ currentValue: 100, maxValue: 100 });

    animator.setTarget('health', -20, 100);
    clock.tick(1);
    expect(animator.getSnapshot('health')).toMatchObject({ currentValue: 0, maxValue: 100 });

    animator.setTarget('health', 5, 0);
    clock.tick(1);
    expect(animator.getSnapshot('health')).toMatchObject({ currentValue: 1, maxValue: 1 });

    animator.setTarget('health', Number.NaN, Number.NaN);
    clock.tick(1);
    expect(animator.getSnapshot('health')).toMatchObject({ currentValue: 0, maxValue: 1 });
  });

  it('re-applying the same target yields the same end state', () => {
    const { clock, animator } = setup();
    const binding = createRecordingBinding(0);
    animator.register('friendship', binding, {
      normalColor: '#ff8800',
      lowColor: '#442200',
      lowThreshold: 0.5,
    });

    animator.setTarget('friendship', 42, 100);
    clock.tick(1);
    const once = { value: last(binding.values), max: last(binding.maxes), color: last(binding.colors) };
    const writesAfterFirst = binding.values.length;

    animator.setTarget('friendship', 42, 100);
    clock.tick(1);

    // The no-op update still performs its terminal write.
    expect(binding.values.length).toBe(writesAfterFirst + 1);
    expect({ value: last(binding.values), max: last(binding.maxes), color: last(binding.colors) }).toEqual(once);
  });

  it('settles on the first frame when the duration is zero', () => {
    const { clock, animator } = setup({ duration: 0 });
    const binding = createRecordingBinding(0);
    animator.register('health', binding, { normalColor: '#000' });

    animator.setTarget('health', 64, 100);
    clock.tick(0.001);

    expect(binding.values).toEqual([64]);
    expect(animator.isAnimating()).toBe(false);
  });

  it('auto-creates unregistered gauges', () => {
    const { clock, animator } = setup();

    animator.setTarget('stamina', 30, 60);
    expect(animator.has('stamina')).toBe(true);
    expect(animator.getSnapshot('stamina')).toMatchObject({ currentValue: 30, targetValue: 30, maxValue: 60 });
    expect(animator.isAnimating()).toBe(true);

    clock.tick(1);
    expect(animator.getSnapshot('stamina')).toMatchObject({ currentValue: 30, fraction: 0.5, isAnimating: false });
  });

  it('ignores setTarget with an empty key', () => {
    const { animator, logger } = setup();
    animator.setTarget('', 10, 100);
    expect(animator.keys()).toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

// --- colors -------------------------------------------------------------

describe('createGaugeAnimator - colors', () => {
  it('writes the threshold color on every frame', () => {
    const { clock, animator } = setup();
    const binding = createRecordingBinding(100);
    animator.register('health', binding, {
      normalColor: RED,
      lowColor: DARK_RED,
      lowThreshold: 0.25,
      highThreshold: 0.75,
    });

    animator.setTarget('health', 0, 100);
    clock.advance(4, 0.125);

    // Frames land on 75, 50, 25, 0: high band edge, normal, low band edge, bottom.
    expect(binding.colors).toHaveLength(5);
    expectColorClose(binding.colors[1], RED);
    expectColorClose(binding.colors[2], RED);
    expectColorClose(binding.colors[3], RED);
    expectColorClose(binding.colors[4], DARK_RED);
  });

  it('leaves the fill color alone during transitions when color transitions are off', () => {
    const { clock, animator } = setup({ colorTransitions: false });
    const binding = createRecordingBinding(100);
    animator.register('health', binding, { normalColor: RED, lowColor: DARK_RED });

    animator.setTarget('health', 0, 100);
    clock.advance(4, 0.125);

    expect(binding.colors).toEqual([RED]);
    expect(binding.values).toEqual([75, 50, 25, 0]);
  });
});

// --- pulse --------------------------------------------------------------

describe('createGaugeAnimator - pulse', () => {
  it('does not write opacity when the pulse is disabled', () => {
    const { clock, animator } = setup({ pulse: false });
    const binding = createRecordingBinding(5);
    animator.register('health', binding, { normalColor: RED, critical: criticalWhenLow });
    clock.advance(3, 0.1);
    expect(binding.opacities).toEqual([]);
  });

  it('keeps non-critical gauges at full opacity', () => {
    const { clock, animator } = setup({ pulse: true });
    const binding = createRecordingBinding(50);
    animator.register('energy', binding, { normalColor: '#000' });
    clock.advance(3, 0.1);
    expect(binding.opacities).toEqual([1, 1, 1]);
  });
});

// --- end to end ---------------------------------------------------------

describe('createGaugeAnimator - health bar scenario', () => {
  it('settles at 10, tints toward dark red and pulses once critical', () => {
    const { clock, animator } = setup({ pulse: true, duration: 600, easing: 'easeInOut' });
    const binding = createRecordingBinding(100);
    animator.register('health', binding, {
      normalColor: RED,
      lowColor: DARK_RED,
      highColor: RED,
      lowThreshold: 0.25,
      highThreshold: 0.75,
      critical: criticalWhenLow,
      maxValue: 100,
    });

    animator.setTarget('health', 10, 100);
    clock.tick(1);

    expect(animator.getSnapshot('health')).toMatchObject({ currentValue: 10, fraction: 0.1, isAnimating: false });
    // t = 0.10 / 0.25 = 0.4 between dark red and red.
    expectColorClose(last(binding.colors), [0.55 + 0.31 * 0.4, 0.08, 0.08, 1]);
    // The pulse stepped before the transition on that frame, while the bar was still full.
    expect(binding.opacities).toEqual([1]);

    clock.tick(0.25);
    const opacity = last(binding.opacities);
    expect(opacity).toBeCloseTo(0.85 + 0.15 * Math.sin(2 * 1.25), 10);
    expect(opacity).not.toBe(1);
  });
});

// --- lifecycle ----------------------------------------------------------

describe('createGaugeAnimator - unregister and dispose', () => {
  it('unregister cancels the transition and is idempotent', () => {
    const { clock, animator } = setup();
    const binding = createRecordingBinding(0);
    animator.register('health', binding, { normalColor: '#000' });

    animator.setTarget('health', 80, 100);
    clock.tick(0.125);
    animator.unregister('health');
    animator.unregister('health');
    animator.unregister('never-registered');
    clock.advance(4, 0.125);

    expect(binding.values).toEqual([20]);
    expect(animator.has('health')).toBe(false);
    expect(animator.getSnapshot('health')).toBeNull();
  });

  it('dispose stops every writer and ignores later calls', () => {
    const { clock, animator, logger } = setup({ pulse: true });
    const health = createRecordingBinding(0);
    const energy = createRecordingBinding(0);
    animator.register('health', health, { normalColor: '#000', critical: criticalWhenLow });
    animator.register('energy', energy, { normalColor: '#000' });
    animator.setTarget('health', 80, 100);
    animator.setTarget('energy', 40, 100);
    clock.tick(0.125);

    const snapshot = {
      health: [health.values.length, health.opacities.length],
      energy: [energy.values.length, energy.opacities.length],
    };

    animator.dispose();
    animator.dispose();
    clock.advance(8, 0.125);

    expect([health.values.length, health.opacities.length]).toEqual(snapshot.health);
    expect([energy.values.length, energy.opacities.length]).toEqual(snapshot.energy);
    expect(animator.keys()).toEqual([]);

    animator.setTarget('health', 10, 100);
    animator.setTarget('health', 20, 100);
    expect(animator.register('magic', createRecordingBinding(), { normalColor: '#000' })).toBe(false);
    expect(animator.keys()).toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

// --- failures -----------------------------------------------------------

describe('createGaugeAnimator - failing bindings', () => {
  it('logs a throwing binding once and keeps other gauges animating', () => {
    const { clock, animator, logger } = setup();
    const broken: GaugeBinding = {
      setValue: () => {
        throw new Error('disposed element');
      },
      setMax: () => {},
      setFillColor: () => {},
      setOpacity: () => {},
    };
    const healthy = createRecordingBinding(0);
    animator.register('broken', broken, { normalColor: '#000' });
    animator.register('healthy', healthy, { normalColor: '#000' });

    animator.setTarget('broken', 50, 100);
    animator.setTarget('healthy', 40, 100);
    clock.advance(4, 0.125);

    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(healthy.values).toEqual([10, 20, 30, 40]);
    expect(animator.getSnapshot('broken')).toMatchObject({ currentValue: 50, isAnimating: false });
  });

  it('emits debug logs only when verbose', () => {
    const quiet = setup();
    quiet.animator.register('health', createRecordingBinding(), { normalColor: '#000' });
    expect(quiet.logger.debug).not.toHaveBeenCalled();

    const loud = setup({ verbose: true });
    loud.animator.register('health', createRecordingBinding(), { normalColor: '#000' });
    expect(loud.logger.debug).toHaveBeenCalledWith('[GaugeAnimator] registered "health" at 0/100');
  });
});
