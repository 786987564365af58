/**
 * @fileoverview Performance timing utilities for measuring operation durations
 */

/**
 * Performance timer for measuring operation durations
 */
export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /** Elapsed milliseconds since the timer started, rounded */
  elapsed(): number;

  /** Stop the timer and return the final duration in milliseconds */
  stop(): number;

  isRunning(): boolean;
}

interface TimerState {
  startTime: number;
  endTime: number | null;
}

/**
 * Create a new performance timer backed by performance.now()
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * await transport.send(request);
 * logger.debug('Attempt finished', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const state: TimerState = {
    startTime: performance.now(),
    endTime: null,
  };

  return {
    get startTime() {
      return state.startTime;
    },

    elapsed(): number {
      const endTime = state.endTime ?? performance.now();
      return Math.round(endTime - state.startTime);
    },

    stop(): number {
      if (state.endTime === null) {
        state.endTime = performance.now();
      }
      return Math.round(state.endTime - state.startTime);
    },

    isRunning(): boolean {
      return state.endTime === null;
    },
  };
}
