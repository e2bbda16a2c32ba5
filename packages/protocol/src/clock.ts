/**
 * Clock adapters.
 *
 * The core only ever reads time, once per transition.
 */

import type { UnixSeconds } from "@keelson/types";
import type { Clock } from "./types.js";

/** Wall-clock time in whole Unix seconds. */
export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * A clock that only moves when told to. Refuses to go backwards.
 */
export class ManualClock implements Clock {
  private current: UnixSeconds;

  constructor(start: UnixSeconds = 0) {
    assertWholeSeconds(start);
    this.current = start;
  }

  now(): UnixSeconds {
    return this.current;
  }

  set(timestamp: UnixSeconds): void {
    assertWholeSeconds(timestamp);
    if (timestamp < this.current) {
      throw new RangeError(
        `Clock is monotonic: cannot move from ${this.current} back to ${timestamp}`,
      );
    }
    this.current = timestamp;
  }

  advance(seconds: number): void {
    this.set(this.current + seconds);
  }
}

function assertWholeSeconds(value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Timestamp must be a non-negative integer, got ${value}`);
  }
}
