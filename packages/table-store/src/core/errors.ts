import { ConditionalCheckFailedException, DynamoDBServiceException } from "@aws-sdk/client-dynamodb"
import { BaseError, findInChain } from "@tablekit/errors"

import type { OperationName } from "./context/operation-details"

export type StoreErrorCode =
  | "build_update_failed"
  | "build_expression_failed"
  | "marshal_failed"
  | "unmarshal_failed"
  | "backend_call_failed"

/**
 * A store call failed for a reason other than a precondition. The original
 * failure is kept as `cause`.
 */
export class StoreOperationError extends BaseError<StoreErrorCode> {
  constructor(
    code: StoreErrorCode,
    message: string,
    details: { operation: OperationName; tableName: string; cause?: unknown },
  ) {
    super(message, {
      code,
      context: { operation: details.operation, tableName: details.tableName },
      cause: details.cause,
      isRetryable: code === "backend_call_failed" && isRetryableBackendError(details.cause),
    })
  }
}

/** An extra field tried to write one of the store-managed attributes. */
export class ReservedFieldError extends BaseError<"reserved_field"> {
  constructor(
    readonly field: string,
    reserved: readonly string[],
  ) {
    super(`tablekit: field "${field}" is reserved`, {
      code: "reserved_field",
      context: { field, reserved },
    })
  }
}

/** A checked delete found no record under the key. */
export class DeleteFailedKeyNotExistsError extends BaseError<"delete_failed_key_not_exists"> {
  constructor(details: { tableName: string; cause?: unknown }) {
    super("tablekit: delete failed, key does not exist", {
      code: "delete_failed_key_not_exists",
      context: { tableName: details.tableName },
      cause: details.cause,
    })
  }
}

export class InvalidCursorError extends BaseError<"invalid_cursor"> {
  constructor(reason: string, cause?: unknown) {
    super(`tablekit: invalid pagination cursor: ${reason}`, {
      code: "invalid_cursor",
      cause,
    })
  }
}

/** A continuation key held an attribute the cursor format cannot carry. */
export class UnsupportedCursorAttributeError extends BaseError<"unsupported_cursor_attribute"> {
  constructor(attribute: string, type: string) {
    super(
      `tablekit: cannot encode cursor, attribute "${attribute}" has type ${type}; only string key attributes are supported`,
      {
        code: "unsupported_cursor_attribute",
        context: { attribute, type },
        isOperational: false,
      },
    )
  }
}

/**
 * True when a conditional write was rejected because its precondition did not
 * hold, anywhere in the cause chain.
 */
export function isConditionalCheckFailed(err: unknown): boolean {
  return (
    findInChain(
      err,
      (v): v is ConditionalCheckFailedException => v instanceof ConditionalCheckFailedException,
    ) !== undefined
  )
}

function isRetryableBackendError(err: unknown): boolean {
  return err instanceof DynamoDBServiceException && err.$retryable !== undefined
}
