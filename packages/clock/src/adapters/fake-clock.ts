import type { Clock } from "../ports/clock"
import type { EpochSeconds, Milliseconds } from "../ports/time"

/** Manually driven clock for tests; time only moves through `advance` and `set`. */
export class FakeClock implements Clock {
  private time: Milliseconds

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  nowEpochSeconds(): EpochSeconds {
    return Math.floor(this.time / 1000)
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }
}
