/** Milliseconds, either a duration or a point since the Unix epoch. */
export type Milliseconds = number

/** Whole seconds since the Unix epoch, the unit table TTL attributes use. */
export type EpochSeconds = number
