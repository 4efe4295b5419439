import type { AttributeValue } from "@aws-sdk/client-dynamodb"

/**
 * Converts stored values to and from the attribute placed in the payload field.
 *
 * @remarks
 * Codecs should be pure. A failure in either direction is reported by the
 * store as a `marshal_failed` / `unmarshal_failed` error.
 *
 * @example
 * A codec storing JSON text in a string attribute:
 * ```ts
 * const jsonCodec: ValueCodec<Order> = {
 *   marshal: (order) => ({ S: JSON.stringify(order) }),
 *   unmarshal: (attr) => {
 *     if (attr.S === undefined) throw new Error("expected a string attribute")
 *     return orderSchema.parse(JSON.parse(attr.S))
 *   },
 * }
 * ```
 */
export interface ValueCodec<V> {
  marshal(value: V): AttributeValue
  unmarshal(attr: AttributeValue): V
}
