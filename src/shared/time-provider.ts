// src/shared/time-provider.ts — Injectable clock
//
// Everything that decides expiry reads time through a TimeProvider so tests
// can move the clock by hand.

export interface TimeProvider {
  /** Get current time in Unix milliseconds */
  now(): number
}

export class SystemTimeProvider implements TimeProvider {
  now(): number {
    return Date.now()
  }
}

export class MockTimeProvider implements TimeProvider {
  private _nowMs: number

  constructor(initialMs: number = Date.now()) {
    this._nowMs = initialMs
  }

  now(): number {
    return this._nowMs
  }

  /** Advance time by milliseconds */
  advance(ms: number): void {
    this._nowMs += ms
  }

  /** Set to a specific timestamp */
  set(ms: number): void {
    this._nowMs = ms
  }
}
