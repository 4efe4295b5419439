import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Render human-readable lines instead of JSON.
   *
   * @remarks
   * Local development only; requires `pino-pretty` to be installed.
   */
  prettify?: boolean
}
