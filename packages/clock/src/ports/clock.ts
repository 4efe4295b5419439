import type { EpochSeconds, Milliseconds } from "./time"

export interface Clock {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since the Unix epoch. */
  nowMs(): Milliseconds

  /** Current time truncated to whole seconds since the Unix epoch. */
  nowEpochSeconds(): EpochSeconds
}
