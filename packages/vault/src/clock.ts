/**
 * Clocks. The vault reads time in whole seconds and never schedules
 * anything; timelocks are compared at call time.
 */

export interface Clock {
  /** Current time in whole seconds */
  now(): number;
}

/** Unix time in seconds. */
export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * A clock that only moves when told to. Starts at 0 unless given a start.
 */
export class ManualClock implements Clock {
  private _now: number;

  constructor(start = 0) {
    assertSeconds(start);
    this._now = start;
  }

  now(): number {
    return this._now;
  }

  advance(seconds: number): number {
    assertSeconds(seconds);
    this._now += seconds;
    return this._now;
  }

  set(seconds: number): void {
    assertSeconds(seconds);
    this._now = seconds;
  }
}

function assertSeconds(value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Clock values must be non-negative whole seconds, got ${value}`);
  }
}
