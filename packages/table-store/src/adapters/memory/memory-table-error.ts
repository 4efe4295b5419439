import { BaseError } from "@tablekit/errors"

/** The in-memory table rejected a request the real service would also reject. */
export class MemoryTableValidationError extends BaseError<"validation_failed"> {
  constructor(message: string) {
    super(message, { code: "validation_failed", isOperational: false })
  }
}
