/** Default partition key attribute name. */
export const DEFAULT_PARTITION_KEY_ATTRIBUTE = "id"

/** Default sort key attribute name. */
export const DEFAULT_SORT_KEY_ATTRIBUTE = "name"

/** Default TTL attribute, holding epoch seconds. */
export const DEFAULT_EXPIRES_ATTRIBUTE = "expires"

/** Default attribute holding the optimistic locking counter. */
export const DEFAULT_VERSION_ATTRIBUTE = "version"

/** Default attribute holding the marshalled value. */
export const DEFAULT_PAYLOAD_ATTRIBUTE = "payload"

/**
 * Attribute names for the five roles the store manages itself.
 *
 * None of these may be written through extra fields.
 */
export type FieldsDef = {
  readonly partitionKeyName: string
  readonly sortKeyName: string
  readonly expiresName: string
  readonly versionName: string
  readonly payloadName: string
}

export const defaultFields: FieldsDef = Object.freeze({
  partitionKeyName: DEFAULT_PARTITION_KEY_ATTRIBUTE,
  sortKeyName: DEFAULT_SORT_KEY_ATTRIBUTE,
  expiresName: DEFAULT_EXPIRES_ATTRIBUTE,
  versionName: DEFAULT_VERSION_ATTRIBUTE,
  payloadName: DEFAULT_PAYLOAD_ATTRIBUTE,
})

export function reservedFieldNames(fields: FieldsDef): readonly string[] {
  return [
    fields.partitionKeyName,
    fields.sortKeyName,
    fields.expiresName,
    fields.versionName,
    fields.payloadName,
  ]
}
