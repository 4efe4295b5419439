import { BaseError } from "@tablekit/errors"

export class ExpressionError extends BaseError<"invalid_expression"> {
  constructor(message: string) {
    super(message, { code: "invalid_expression", isOperational: false })
  }
}
