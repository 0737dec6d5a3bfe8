/**
 * @lockbox/ledger: Clocks.
 *
 * Every custody operation reads the clock once, after it holds the
 * account lock, and uses that instant throughout.
 */

import type { Clock } from "./types.js";

/** Wall clock, truncated to whole seconds. */
export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * A clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private _now: number;

  constructor(start: number = 0) {
    this._now = start;
  }

  now(): number {
    return this._now;
  }

  set(timestamp: number): void {
    this._now = timestamp;
  }

  advance(seconds: number): void {
    if (seconds < 0) {
      throw new RangeError(`Cannot move a clock backwards (${seconds}s)`);
    }
    this._now += seconds;
  }
}
