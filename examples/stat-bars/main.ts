import {
  createAnimationFrameClock,
  createDomGaugeBinding,
  createGaugeAnimator,
  registerStatGauges,
  statGaugeKeys,
  syncStatGauges,
} from '../../src/index';
import type { DomGaugeBinding, StatBlock, StatGaugeKey } from '../../src/index';

const showError = (message: string): void => {
  const el = document.getElementById('error');
  if (!el) return;
  el.textContent = message;
  el.style.display = 'block';
};

const setStatus = (message: string): void => {
  const el = document.getElementById('status');
  if (!el) return;
  el.textContent = message;
};

/**
 * Small deterministic RNG (LCG) so the random stat swings repeat across reloads.
 */
const createRng = (seed: number): (() => number) => {
  let s = (seed >>> 0) || 1;
  return () => {
    s = (1664525 * s + 1013904223) >>> 0;
    return s / 0xffffffff;
  };
};

const maxStats = {
  maxHealth: 120,
  maxEnergy: 80,
  maxMagic: 60,
  maxFriendship: 100,
  maxDiscord: 100,
} as const satisfies StatBlock;

const createBindings = (): Partial<Record<StatGaugeKey, DomGaugeBinding>> => {
  const bindings: Partial<Record<StatGaugeKey, DomGaugeBinding>> = {};
  for (const key of statGaugeKeys) {
    const track = document.querySelector<HTMLElement>(`[data-stat="${key}"] .track`);
    if (!track) continue;
    const label = document.querySelector<HTMLElement>(`[data-stat="${key}"] .value`);
    bindings[key] = createDomGaugeBinding(track, { label });
  }
  return bindings;
};

function main(): void {
  const clock = createAnimationFrameClock();
  const animator = createGaugeAnimator(clock, {
    duration: 600,
    easing: 'easeInOut',
    onSettled: (snapshot) => setStatus(`${snapshot.key} settled at ${Math.round(snapshot.currentValue)}/${snapshot.maxValue}`),
  });

  const bindings = createBindings();
  const registered = registerStatGauges(animator, bindings);
  if (registered.length === 0) {
    throw new Error('No stat bars found in the page');
  }

  const rng = createRng(7);
  const randomize = (): void => {
    syncStatGauges(animator, {
      ...maxStats,
      health: rng() * maxStats.maxHealth,
      energy: rng() * maxStats.maxEnergy,
      magic: rng() * maxStats.maxMagic,
      friendship: rng() * maxStats.maxFriendship,
      discord: rng() * maxStats.maxDiscord,
    });
  };

  // Start from full bars so the first swing is visible.
  syncStatGauges(animator, {
    ...maxStats,
    health: maxStats.maxHealth,
    energy: maxStats.maxEnergy,
    magic: maxStats.maxMagic,
    friendship: maxStats.maxFriendship * 0.5,
    discord: 0,
  });

  document.getElementById('randomize')?.addEventListener('click', randomize);
  document.getElementById('hurt')?.addEventListener('click', () => {
    const current = animator.getSnapshot('health');
    if (!current) return;
    animator.setTarget('health', current.targetValue - 25, current.maxValue);
  });
  document.getElementById('heal')?.addEventListener('click', () => {
    const current = animator.getSnapshot('health');
    if (!current) return;
    animator.setTarget('health', current.targetValue + 25, current.maxValue);
  });

  let cleanedUp = false;
  const cleanup = (): void => {
    if (cleanedUp) return;
    cleanedUp = true;
    animator.dispose();
    clock.destroy();
    for (const binding of Object.values(bindings)) binding?.dispose();
  };

  window.addEventListener('beforeunload', cleanup);
}

try {
  main();
} catch (err) {
  console.error(err);
  showError(err instanceof Error ? err.message : String(err));
}
