/**
 * @ballast/protocol — Time source.
 *
 * The core reads time only through a Clock, in whole unix seconds.
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
 * A clock that moves only when told to.
 */
export class ManualClock implements Clock {
  private _now: number;

  constructor(start = 0) {
    this._now = start;
  }

  now(): number {
    return this._now;
  }

  set(seconds: number): void {
    this._now = seconds;
  }

  advance(seconds: number): number {
    this._now += seconds;
    return this._now;
  }
}
