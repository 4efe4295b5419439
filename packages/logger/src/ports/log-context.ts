/**
 * Well-known fields attached to table store log entries.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  /** Store operation, e.g. "Create" or "ListBySortKeyPrefix". */
  operation: string
  tableName: string
  indexName: string
  partitionKey: string
  sortKey: string

  durationMs: number
  consumedCapacity: unknown
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * Partial overlay applied to an existing context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
