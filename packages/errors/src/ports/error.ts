export type ErrorCode = Lowercase<string>

/**
 * Structured metadata carried by an error (table name, operation, offending
 * field) so callers never need to parse messages.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lowercase code for programmatic handling. */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when repeating the same call might succeed. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (conditional check, missing record,
   * throttling); `false` for programmer errors and corrupted data.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and transports.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
