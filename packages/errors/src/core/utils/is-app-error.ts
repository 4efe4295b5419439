import type { AppError } from "../../ports/error"

export function isAppError(e: unknown): e is AppError {
  if (!(e instanceof Error)) return false

  const candidate: Partial<Record<keyof AppError, unknown>> = { ...e }

  return (
    typeof candidate.code === "string" &&
    typeof candidate.context === "object" &&
    candidate.context !== null &&
    typeof candidate.isRetryable === "boolean" &&
    typeof candidate.isOperational === "boolean" &&
    candidate.timestamp instanceof Date
  )
}
