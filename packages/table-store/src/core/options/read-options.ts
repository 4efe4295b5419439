export type IndexRef = {
  readonly name: string
  readonly partitionKeyName: string
  readonly sortKeyName: string
}

export type ReadOptions = {
  consistentRead: boolean
  /** Cursor from a previous listing; `""` starts from the beginning. */
  lastEvaluatedKey: string
  /** Maximum items per listing; `0` leaves it to the backend. */
  limit: number
  index: IndexRef | undefined
}

export type ReadOption =
  | { readonly kind: "consistent_read"; readonly enabled: boolean }
  | { readonly kind: "last_evaluated_key"; readonly cursor: string }
  | { readonly kind: "limit"; readonly limit: number }
  | { readonly kind: "index"; readonly index: IndexRef }

export function readWithConsistentRead(enabled: boolean): ReadOption {
  return { kind: "consistent_read", enabled }
}

/** Resumes a listing from the cursor a previous page returned. */
export function readWithLastEvaluatedKey(cursor: string): ReadOption {
  return { kind: "last_evaluated_key", cursor }
}

export function readWithLimit(limit: number): ReadOption {
  return { kind: "limit", limit }
}

/**
 * Runs a listing against a secondary index keyed by the given attributes
 * instead of the table's primary key.
 */
export function readWithIndex(
  name: string,
  partitionKeyName: string,
  sortKeyName: string,
): ReadOption {
  return { kind: "index", index: { name, partitionKeyName, sortKeyName } }
}

export function defaultReadOptions(): ReadOptions {
  return { consistentRead: false, lastEvaluatedKey: "", limit: 0, index: undefined }
}

export function applyReadOptions(target: ReadOptions, options: readonly ReadOption[]): ReadOptions {
  for (const option of options) {
    switch (option.kind) {
      case "consistent_read":
        target.consistentRead = option.enabled
        break
      case "last_evaluated_key":
        target.lastEvaluatedKey = option.cursor
        break
      case "limit":
        target.limit = option.limit
        break
      case "index":
        target.index = option.index
        break
    }
  }

  return target
}
