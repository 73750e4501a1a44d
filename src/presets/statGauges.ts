import type { GaugeBinding, GaugeConfig, Rgba01 } from '../config/types';
import type { GaugeAnimator } from '../gauges/createGaugeAnimator';
import { criticalWhenHigh, criticalWhenLow } from '../gauges/critical';
import { brightenColor, multiplyColor } from '../utils/colors';

export type StatGaugeKey = 'health' | 'energy' | 'magic' | 'friendship' | 'discord';

export const statGaugeKeys: ReadonlyArray<StatGaugeKey> = ['health', 'energy', 'magic', 'friendship', 'discord'];

export const statColors = {
  health: [0.86, 0.2, 0.2, 1],
  healthLow: [0.7, 0.12, 0.12, 1],
  energy: [0.2, 0.59, 0.86, 1],
  magic: [0.59, 0.2, 0.86, 1],
  friendship: [0.86, 0.59, 0.2, 1],
  discord: [0.47, 0.2, 0.59, 1],
  discordHigh: [0.31, 0.12, 0.39, 1],
} as const satisfies Record<string, Rgba01>;

/** Low colors of the plain resource bars are the normal color at 70% brightness. */
const DIM_FACTOR = 0.7;
const BRIGHT_FACTOR = 1.2;

export const statGaugePresets: Readonly<Record<StatGaugeKey, GaugeConfig>> = {
  health: {
    normalColor: statColors.health,
    lowColor: statColors.healthLow,
    highColor: statColors.health,
    lowThreshold: 0.25,
    highThreshold: 0.75,
    critical: criticalWhenLow,
  },
  energy: {
    normalColor: statColors.energy,
    lowColor: multiplyColor(statColors.energy, DIM_FACTOR),
    highColor: statColors.energy,
    lowThreshold: 0.25,
    highThreshold: 0.75,
  },
  magic: {
    normalColor: statColors.magic,
    lowColor: multiplyColor(statColors.magic, DIM_FACTOR),
    highColor: statColors.magic,
    lowThreshold: 0.25,
    highThreshold: 0.75,
  },
  friendship: {
    normalColor: statColors.friendship,
    lowColor: multiplyColor(statColors.friendship, DIM_FACTOR),
    highColor: brightenColor(statColors.friendship, BRIGHT_FACTOR),
    lowThreshold: 0.25,
    highThreshold: 0.8,
  },
  discord: {
    normalColor: statColors.discord,
    lowColor: statColors.discord,
    highColor: statColors.discordHigh,
    lowThreshold: 0.25,
    highThreshold: 0.6,
    critical: criticalWhenHigh,
  },
};

export interface StatBlock {
  readonly health?: number;
  readonly maxHealth?: number;
  readonly energy?: number;
  readonly maxEnergy?: number;
  readonly magic?: number;
  readonly maxMagic?: number;
  readonly friendship?: number;
  readonly maxFriendship?: number;
  readonly discord?: number;
  readonly maxDiscord?: number;
}

const statFields: Readonly<Record<StatGaugeKey, readonly [keyof StatBlock, keyof StatBlock]>> = {
  health: ['health', 'maxHealth'],
  energy: ['energy', 'maxEnergy'],
  magic: ['magic', 'maxMagic'],
  friendship: ['friendship', 'maxFriendship'],
  discord: ['discord', 'maxDiscord'],
};

/**
 * Registers the preset gauges for every binding provided.
 * `overrides` are merged over the preset per key.
 *
 * @returns Keys that were registered
 */
export function registerStatGauges(
  animator: GaugeAnimator,
  bindings: Partial<Record<StatGaugeKey, GaugeBinding | null>>,
  overrides: Partial<Record<StatGaugeKey, Partial<GaugeConfig>>> = {}
): StatGaugeKey[] {
  const registered: StatGaugeKey[] = [];
  for (const key of statGaugeKeys) {
    const binding = bindings[key];
    if (!binding) continue;
    const config: GaugeConfig = { ...statGaugePresets[key], ...overrides[key] };
    if (animator.register(key, binding, config)) registered.push(key);
  }
  return registered;
}

/**
 * Pushes a stat block into the registered stat gauges.
 * Pairs with a missing value or max, and gauges that are not registered, are skipped.
 */
export function syncStatGauges(animator: GaugeAnimator, stats: StatBlock): void {
  for (const key of statGaugeKeys) {
    if (!animator.has(key)) continue;
    const [valueField, maxField] = statFields[key];
    const value = stats[valueField];
    const max = stats[maxField];
    if (value === undefined || max === undefined) continue;
    animator.setTarget(key, value, max);
  }
}
