export interface Clock {
  /** Seconds on the clock's own timeline. */
  now(): number;
}

export interface ManualClock extends Clock {
  advance(seconds: number): void;
  set(seconds: number): void;
}

export function manualClock(start = 0): ManualClock {
  let current = start;
  return {
    now: () => current,
    advance(seconds: number) {
      current += seconds;
    },
    set(seconds: number) {
      current = seconds;
    },
  };
}

export const systemClock: Clock = {
  now: () => performance.now() / 1000,
};
