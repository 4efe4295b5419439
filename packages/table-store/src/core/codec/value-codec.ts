import { convertToAttr, convertToNative } from "@aws-sdk/util-dynamodb"

import type { ValueCodec } from "../../ports/value-codec"

/**
 * Maps values onto native attribute types: strings to `S`, numbers to `N`,
 * byte arrays to `B`, plain objects and class instances to `M`, arrays to `L`.
 * Undefined object members are dropped.
 */
export function attributeValueCodec<V>(): ValueCodec<V> {
  return {
    marshal: (value) =>
      convertToAttr(value, { removeUndefinedValues: true, convertClassInstanceToMap: true }),
    unmarshal: (attr) => convertToNative(attr),
  }
}
