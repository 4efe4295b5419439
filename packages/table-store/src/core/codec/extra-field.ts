import type { AttributeValue } from "@aws-sdk/client-dynamodb"
import { convertToAttr } from "@aws-sdk/util-dynamodb"

/**
 * Marshals an extra field value with the same rules as the default codec. The
 * store skips fields whose value is `undefined` before calling this.
 */
export function convertExtraField(value: unknown): AttributeValue {
  return convertToAttr(value, { removeUndefinedValues: true, convertClassInstanceToMap: true })
}
