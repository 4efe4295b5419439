import type { Key } from "../../ports/key"
import { keyToString } from "../codec/attribute-values"
import { type CallContext, ContextKey } from "./call-context"

export type OperationName = "Create" | "Get" | "Update" | "Delete" | "ListBySortKeyPrefix"

/**
 * Identifies the store call in progress. Attached to the context before any
 * hook runs.
 */
export type OperationDetails = {
  readonly name: OperationName
  /** Keys in text form; byte keys are base64. */
  readonly partitionKey: string
  /** For listings, the sort key prefix. */
  readonly sortKey: string
}

const operationDetailsKey = new ContextKey<OperationDetails>("tablekit.operationDetails")

export function withOperationDetails(
  ctx: CallContext,
  name: OperationName,
  partitionKey: Key,
  sortKey: Key,
): CallContext {
  return ctx.withValue(operationDetailsKey, {
    name,
    partitionKey: keyToString(partitionKey),
    sortKey: keyToString(sortKey),
  })
}

/**
 * Operation details attached by the store, or `undefined` when the context
 * did not come from a store call.
 */
export function operationDetailsFromContext(ctx: CallContext): OperationDetails | undefined {
  return ctx.value(operationDetailsKey)
}
