import type { CriticalContext, CriticalPredicate, GaugeKey, GaugeLogger } from '../config/types';
import type { ResolvedPulseConfig } from '../config/OptionResolver';
import type { TaskId, TaskScheduler } from '../core/createTaskScheduler';

/** What the pulse needs to know about one gauge on a given frame. */
export interface PulseGauge extends CriticalContext {
  readonly critical: CriticalPredicate;
  setOpacity(opacity: number): void;
}

export interface PulseOverseer {
  /** Starts the pulse task. No-op while already running. */
  start(): void;
  /** Cancels the pulse task. No-op while stopped. */
  stop(): void;
  isRunning(): boolean;
}

export interface PulseOverseerOptions {
  readonly logger?: GaugeLogger;
}

export const computePulseOpacity = (elapsedSeconds: number, config: ResolvedPulseConfig): number =>
  config.base + config.amplitude * Math.sin(config.frequency * elapsedSeconds);

/**
 * One long-running task that dims critical gauges in a sine wave.
 *
 * Only opacity is written, so it never contends with value/color transitions
 * on the same binding.
 */
export function createPulseOverseer(
  scheduler: TaskScheduler,
  getGauges: () => Iterable<PulseGauge>,
  config: ResolvedPulseConfig,
  options: PulseOverseerOptions = {}
): PulseOverseer {
  const logger = options.logger ?? console;
  const warnedPredicateKeys = new Set<GaugeKey>();
  let taskId: TaskId | null = null;

  const isCritical = (gauge: PulseGauge): boolean => {
    try {
      return gauge.critical(gauge) === true;
    } catch (error) {
      if (!warnedPredicateKeys.has(gauge.key)) {
        warnedPredicateKeys.add(gauge.key);
        logger.warn(`[PulseOverseer] critical predicate for "${gauge.key}" threw; treating as not critical.`, error);
      }
      return false;
    }
  };

  const start: PulseOverseer['start'] = () => {
    if (taskId !== null && scheduler.isActive(taskId)) return;
    taskId = scheduler.schedule({
      step(frame) {
        const pulse = computePulseOpacity(frame.elapsedSeconds, config);
        for (const gauge of getGauges()) {
          gauge.setOpacity(isCritical(gauge) ? pulse : 1);
        }
        return true;
      },
    });
  };

  const stop: PulseOverseer['stop'] = () => {
    if (taskId === null) return;
    scheduler.cancel(taskId);
    taskId = null;
  };

  return {
    start,
    stop,
    isRunning: () => taskId !== null && scheduler.isActive(taskId),
  };
}
