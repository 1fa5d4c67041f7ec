/**
 * Clock capability
 *
 * Every operation reads "now" once from an injected clock, in unix seconds.
 * The clock never moves backwards but two reads may return the same second.
 */

export interface Clock {
  now(): number;
}

export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * Clock driven by hand, for tests and replay
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    assertSeconds(start);
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(seconds: number): void {
    assertSeconds(seconds);
    if (seconds < this.current) {
      throw new RangeError(`Clock cannot move backwards: ${seconds} < ${this.current}`);
    }
    this.current = seconds;
  }

  advance(seconds: number): number {
    this.set(this.current + seconds);
    return this.current;
  }
}

function assertSeconds(value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Expected non-negative integer seconds, got ${value}`);
  }
}

export const systemClock: Clock = new SystemClock();
