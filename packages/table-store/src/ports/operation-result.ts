import type { ConsumedCapacity } from "@aws-sdk/client-dynamodb"

/**
 * Returned by every store call.
 */
export type OperationResult = {
  /**
   * Record version after the call; `0` when the record carries none (reads of
   * missing records, listings).
   */
  readonly version: number

  /** Capacity accounting reported by the table, when it reports any. */
  readonly consumedCapacity?: ConsumedCapacity

  /**
   * Opaque cursor for the next page of a listing; `""` once exhausted.
   * Only set by listings.
   */
  readonly lastEvaluatedKey?: string
}

export type StoreGetResult<V> =
  | { readonly kind: "found"; readonly value: V; readonly result: OperationResult }
  | { readonly kind: "not_found"; readonly result: OperationResult }

export type StoreListResult<V> = {
  readonly values: readonly V[]
  readonly result: OperationResult & { readonly lastEvaluatedKey: string }
}
