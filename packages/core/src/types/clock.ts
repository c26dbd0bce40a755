/** Source of the current instant. Injected wherever "now" matters. */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export interface ManualClock extends Clock {
  /** Move the clock forward by `ms` milliseconds */
  advance(ms: number): void;
  set(instant: Date | string): void;
}

/** A clock that only moves when told to. For tests and reproducible runs. */
export function createManualClock(start: Date | string): ManualClock {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current),
    advance: (ms: number) => { current += ms; },
    set: (instant: Date | string) => { current = new Date(instant).getTime(); },
  };
}
