/**
 * Clock
 *
 * Deadlines and creation times are unix seconds. Components take a
 * Clock so tests can pin "now".
 */

export interface Clock {
  /** Current time in unix seconds */
  now(): bigint;
}

/** Wall-clock time, truncated to whole seconds. */
export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};

/**
 * A clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private _now: bigint;

  constructor(start: bigint) {
    this._now = start;
  }

  now(): bigint {
    return this._now;
  }

  set(time: bigint): void {
    this._now = time;
  }

  advance(seconds: bigint): void {
    this._now += seconds;
  }
}
