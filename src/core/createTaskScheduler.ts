import type { FrameClock, FrameInfo } from './FrameClock';
import type { GaugeLogger } from '../config/types';

export type TaskId = number;

/**
 * A cooperative unit of per-frame work.
 * `step` runs once per frame; returning `false` finishes the task.
 */
export interface FrameTask {
  step(frame: FrameInfo): boolean;
}

export interface TaskScheduler {
  /** Queues a task. It first steps on the frame after the one in progress (if any). */
  schedule(task: FrameTask): TaskId;
  /**
   * Cancels a task. The task will not step again, including later in the
   * current frame. Unknown or finished ids are ignored.
   * @returns true if a live task was cancelled
   */
  cancel(id: TaskId): boolean;
  cancelAll(): void;
  isActive(id: TaskId): boolean;
  activeCount(): number;
  dispose(): void;
}

export interface TaskSchedulerOptions {
  readonly logger?: GaugeLogger;
}

interface TaskRecord {
  readonly id: TaskId;
  readonly task: FrameTask;
  /** Cancellation token, checked before every step. */
  cancelled: boolean;
}

/**
 * Runs frame tasks off a single {@link FrameClock}.
 *
 * - Tasks step in scheduling order, exactly once per frame.
 * - The scheduler subscribes to the clock only while tasks are live.
 * - A task that throws is finished and logged; other tasks keep running.
 */
export function createTaskScheduler(clock: FrameClock, options: TaskSchedulerOptions = {}): TaskScheduler {
  const logger = options.logger ?? console;
  const tasks = new Map<TaskId, TaskRecord>();
  let nextId = 1;
  let disposed = false;
  let unsubscribe: (() => void) | null = null;

  const release = (record: TaskRecord): void => {
    record.cancelled = true;
    tasks.delete(record.id);
  };

  const detachIfIdle = (): void => {
    if (tasks.size > 0 || unsubscribe === null) return;
    const unsub = unsubscribe;
    unsubscribe = null;
    unsub();
  };

  const onFrame = (frame: FrameInfo): void => {
    // Snapshot: tasks scheduled during this frame wait for the next one.
    const snapshot = Array.from(tasks.values());
    for (const record of snapshot) {
      if (record.cancelled) continue;

      let keepRunning: boolean;
      try {
        keepRunning = record.task.step(frame);
      } catch (error) {
        logger.error(`[TaskScheduler] task ${record.id} threw and was stopped:`, error);
        keepRunning = false;
      }

      if (!keepRunning && !record.cancelled) release(record);
    }
    detachIfIdle();
  };

  const schedule: TaskScheduler['schedule'] = (task) => {
    if (disposed) {
      throw new Error('TaskScheduler is disposed. Create a new scheduler before scheduling tasks.');
    }
    const id = nextId++;
    tasks.set(id, { id, task, cancelled: false });
    if (unsubscribe === null) unsubscribe = clock.onFrame(onFrame);
    return id;
  };

  const cancel: TaskScheduler['cancel'] = (id) => {
    const record = tasks.get(id);
    if (!record) return false;
    release(record);
    detachIfIdle();
    return true;
  };

  const cancelAll: TaskScheduler['cancelAll'] = () => {
    for (const record of Array.from(tasks.values())) release(record);
    detachIfIdle();
  };

  return {
    schedule,
    cancel,
    cancelAll,
    isActive: (id) => tasks.has(id),
    activeCount: () => tasks.size,
    dispose() {
      if (disposed) return;
      disposed = true;
      cancelAll();
    },
  };
}
