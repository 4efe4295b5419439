import type { Clock } from "../ports/clock"
import type { EpochSeconds, Milliseconds } from "../ports/time"

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): Milliseconds {
    return Date.now()
  }

  nowEpochSeconds(): EpochSeconds {
    return Math.floor(this.nowMs() / 1000)
  }
}
