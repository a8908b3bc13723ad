export interface TimerHandle {
  cancel(): void;
}

/** Wall-clock time and one-shot timers, injectable so tests can drive time. */
export interface Clock {
  /** Milliseconds since the epoch. */
  now(): number;
  schedule(delayMs: number, fn: () => void): TimerHandle;
}

/** Longest delay setTimeout keeps; anything larger is clamped to 1ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export const systemClock: Clock = {
  now: () => Date.now(),
  schedule(delayMs, fn) {
    let timer: NodeJS.Timeout;

    // Delays past the setTimeout limit run as a chain of shorter timers
    const arm = (remaining: number) => {
      const chunk = Math.min(Math.max(0, remaining), MAX_TIMER_DELAY_MS);
      timer = setTimeout(() => {
        if (remaining > chunk) arm(remaining - chunk);
        else fn();
      }, chunk);
    };
    arm(delayMs);

    return { cancel: () => clearTimeout(timer) };
  },
};
