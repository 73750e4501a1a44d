/**
 * FrameClock - the single time source that drives every gauge task.
 *
 * Two implementations share one interface:
 * - {@link createAnimationFrameClock}: requestAnimationFrame loop (timer fallback outside browsers).
 * - {@link createManualFrameClock}: frames are pushed by hand via `tick()`, for tests and headless hosts.
 *
 * Both deliver delta time and accumulated elapsed time in seconds.
 */

export interface FrameInfo {
  /** Seconds since the previous frame (never negative). */
  readonly deltaSeconds: number;
  /** Seconds accumulated across all frames of this clock. */
  readonly elapsedSeconds: number;
  /** 1-based frame counter. */
  readonly frame: number;
}

export type FrameCallback = (frame: FrameInfo) => void;

export interface FrameClock {
  /**
   * Subscribes to frames.
   * @returns Unsubscribe function (idempotent)
   */
  onFrame(callback: FrameCallback): () => void;
  getElapsedSeconds(): number;
  /** Stops the clock and drops all subscribers. */
  destroy(): void;
}

export interface ManualFrameClock extends FrameClock {
  /** Emits one frame advancing time by `deltaSeconds`. */
  tick(deltaSeconds: number): void;
  /** Emits `count` frames of `deltaSeconds` each. */
  advance(count: number, deltaSeconds: number): void;
}

export interface AnimationFrameClockOptions {
  /** Millisecond time source (default: `performance.now()`). */
  readonly now?: () => number;
  /**
   * Cap on a single frame delta in seconds (default: 0.1).
   * Prevents animation jumps after the tab was idle.
   */
  readonly maxDeltaSeconds?: number;
}

const DEFAULT_MAX_DELTA_SECONDS = 0.1;

/** Timer fallback period when requestAnimationFrame is unavailable (~60fps). */
const FALLBACK_FRAME_MS = 1000 / 60;

const sanitizeDelta = (delta: number): number => (Number.isFinite(delta) && delta > 0 ? delta : 0);

/**
 * Shared subscriber bookkeeping. Emits to a snapshot so subscriptions
 * added or removed during a frame don't affect that frame.
 */
function createFrameEmitter(onEmpty: () => void, onFirst: () => void) {
  const listeners = new Set<FrameCallback>();
  let elapsedSeconds = 0;
  let frame = 0;

  const emit = (deltaSeconds: number): void => {
    const delta = sanitizeDelta(deltaSeconds);
    elapsedSeconds += delta;
    frame++;
    const info: FrameInfo = { deltaSeconds: delta, elapsedSeconds, frame };

    const snapshot = Array.from(listeners);
    for (const cb of snapshot) {
      if (!listeners.has(cb)) continue;
      try {
        cb(info);
      } catch (error) {
        console.error('FrameClock: error in frame callback:', error);
      }
    }
  };

  const subscribe = (callback: FrameCallback): (() => void) => {
    const wasEmpty = listeners.size === 0;
    listeners.add(callback);
    if (wasEmpty) onFirst();
    return () => {
      if (!listeners.delete(callback)) return;
      if (listeners.size === 0) onEmpty();
    };
  };

  return {
    emit,
    subscribe,
    hasListeners: (): boolean => listeners.size > 0,
    getElapsedSeconds: (): number => elapsedSeconds,
    clear: (): void => listeners.clear(),
  };
}

export function createManualFrameClock(): ManualFrameClock {
  let destroyed = false;
  const emitter = createFrameEmitter(
    () => {},
    () => {}
  );

  const tick: ManualFrameClock['tick'] = (deltaSeconds) => {
    if (destroyed) return;
    emitter.emit(deltaSeconds);
  };

  return {
    onFrame: (callback) => (destroyed ? () => {} : emitter.subscribe(callback)),
    getElapsedSeconds: emitter.getElapsedSeconds,
    tick,
    advance(count, deltaSeconds) {
      const n = Number.isFinite(count) ? Math.max(0, Math.floor(count)) : 0;
      for (let i = 0; i < n; i++) tick(deltaSeconds);
    },
    destroy() {
      destroyed = true;
      emitter.clear();
    },
  };
}

/**
 * Creates a clock driven by requestAnimationFrame.
 *
 * The loop only runs while at least one subscriber exists; the first frame after
 * an idle period measures its delta from the moment of subscription.
 */
export function createAnimationFrameClock(options: AnimationFrameClockOptions = {}): FrameClock {
  const now = options.now ?? (() => performance.now());
  const maxDeltaSeconds =
    options.maxDeltaSeconds !== undefined && Number.isFinite(options.maxDeltaSeconds) && options.maxDeltaSeconds > 0
      ? options.maxDeltaSeconds
      : DEFAULT_MAX_DELTA_SECONDS;
  const hasRaf = typeof requestAnimationFrame === 'function' && typeof cancelAnimationFrame === 'function';

  let destroyed = false;
  let rafId: number | null = null;
  let timerId: ReturnType<typeof setTimeout> | null = null;
  let lastFrameTime = 0;

  const cancelPending = (): void => {
    if (rafId !== null) {
      cancelAnimationFrame(rafId);
      rafId = null;
    }
    if (timerId !== null) {
      clearTimeout(timerId);
      timerId = null;
    }
  };

  const frameHandler = (): void => {
    // We are no longer scheduled (now idle) until rescheduled below.
    rafId = null;
    timerId = null;
    if (destroyed || !emitter.hasListeners()) return;

    const currentTime = now();
    const delta = Math.min(maxDeltaSeconds, Math.max(0, (currentTime - lastFrameTime) / 1000));
    lastFrameTime = currentTime;

    emitter.emit(delta);

    if (!destroyed && emitter.hasListeners()) scheduleFrame();
  };

  const scheduleFrame = (): void => {
    if (rafId !== null || timerId !== null) return;
    if (hasRaf) {
      rafId = requestAnimationFrame(frameHandler);
    } else {
      timerId = setTimeout(frameHandler, FALLBACK_FRAME_MS);
    }
  };

  const emitter = createFrameEmitter(cancelPending, () => {
    lastFrameTime = now();
    scheduleFrame();
  });

  return {
    onFrame: (callback) => (destroyed ? () => {} : emitter.subscribe(callback)),
    getElapsedSeconds: emitter.getElapsedSeconds,
    destroy() {
      if (destroyed) return;
      destroyed = true;
      cancelPending();
      emitter.clear();
    },
  };
}
