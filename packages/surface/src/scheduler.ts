/**
 * A pending callback that can be cancelled before it runs.
 */
export interface ScheduledTask {
  cancel(): void;
}

/**
 * Time source and one-shot timer used by component instances.
 */
export interface TimerScheduler {
  /** Current time in epoch milliseconds */
  now(): number;
  schedule(delayMs: number, callback: () => void): ScheduledTask;
}

/** Longest delay a single setTimeout honours; larger ones fire after 1 ms */
export const MAX_TIMER_DELAY_MS = 0x7fffffff;

/**
 * Scheduler backed by Date.now and setTimeout. Delays beyond
 * MAX_TIMER_DELAY_MS are split into chunks.
 */
export const systemScheduler: TimerScheduler = {
  now: () => Date.now(),
  schedule(delayMs, callback) {
    let handle: ReturnType<typeof setTimeout>;

    const arm = (remaining: number): void => {
      if (remaining > MAX_TIMER_DELAY_MS) {
        handle = setTimeout(() => arm(remaining - MAX_TIMER_DELAY_MS), MAX_TIMER_DELAY_MS);
        return;
      }
      handle = setTimeout(callback, remaining);
    };
    arm(delayMs);

    return {
      cancel: () => clearTimeout(handle),
    };
  },
};
