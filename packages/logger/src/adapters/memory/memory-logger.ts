import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { type LogLevelName, logLevelNames } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type MemoryLogEntry = {
  readonly level: LogLevelName
  readonly message: string

  /** Child bindings merged with the call's meta. */
  readonly fields: Record<string, unknown>
}

/**
 * Keeps entries in an array instead of writing them anywhere. Children append
 * to their parent's array.
 */
export class MemoryLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  constructor(
    private readonly sink: MemoryLogEntry[] = [],
    private readonly opts: Partial<LoggerOptions> = {},
    private readonly bindings: LogContextPatch = {},
  ) {}

  get entries(): readonly MemoryLogEntry[] {
    return this.sink
  }

  clear(): void {
    this.sink.length = 0
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new MemoryLogger<TContext & U>(this.sink, this.opts, { ...this.bindings, ...context })
  }

  private write(level: LogLevelName, message: string, meta: LogMeta<TContext> | undefined): void {
    const min = this.opts.level ?? "trace"
    if (logLevelNames.indexOf(level) < logLevelNames.indexOf(min)) return

    this.sink.push({ level, message, fields: { ...this.bindings, ...meta } })
  }
}
