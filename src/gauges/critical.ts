import type { CriticalPredicate } from '../config/types';

/** Critical while the gauge is at or below its low threshold (e.g. health). */
export const criticalWhenLow: CriticalPredicate = ({ fraction, lowThreshold }) => fraction <= lowThreshold;

/** Critical while the gauge is at or above its high threshold (e.g. discord). */
export const criticalWhenHigh: CriticalPredicate = ({ fraction, highThreshold }) => fraction >= highThreshold;

export const neverCritical: CriticalPredicate = () => false;
