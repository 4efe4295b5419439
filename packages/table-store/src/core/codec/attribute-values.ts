import type { AttributeValue } from "@aws-sdk/client-dynamodb"
import { convertToAttr } from "@aws-sdk/util-dynamodb"

import type { Key } from "../../ports/key"

export function marshalKey(key: Key): AttributeValue {
  if (typeof key === "number" && !Number.isInteger(key)) {
    throw new RangeError(`number key ${key} is not an integer`)
  }
  return convertToAttr(key)
}

const integerText = /^-?\d+$/

/**
 * Canonical text of an `N` value: integers go through `BigInt`, so digits past
 * 2^53 survive, anything else through `Number`.
 */
export function canonicalNumber(text: string): string {
  const trimmed = text.trim()
  return integerText.test(trimmed) ? BigInt(trimmed).toString() : String(Number(trimmed))
}

function compareNumbers(a: string, b: string): number {
  const left = a.trim()
  const right = b.trim()

  if (integerText.test(left) && integerText.test(right)) {
    const x = BigInt(left)
    const y = BigInt(right)
    return x < y ? -1 : x > y ? 1 : 0
  }
  return Number(left) - Number(right)
}

export function keyToString(key: Key): string {
  if (typeof key === "string") return key
  if (key instanceof Uint8Array) return Buffer.from(key).toString("base64")
  return String(key)
}

export function attributeType(attr: AttributeValue): string {
  if (attr.S !== undefined) return "S"
  if (attr.N !== undefined) return "N"
  if (attr.B !== undefined) return "B"
  if (attr.BOOL !== undefined) return "BOOL"
  if (attr.NULL !== undefined) return "NULL"
  if (attr.M !== undefined) return "M"
  if (attr.L !== undefined) return "L"
  if (attr.SS !== undefined) return "SS"
  if (attr.NS !== undefined) return "NS"
  if (attr.BS !== undefined) return "BS"
  return "unknown"
}

/**
 * Scalar equality with table semantics: same type, numbers compared by value,
 * bytes compared bytewise. Non-scalar attributes compare by structure.
 */
export function attributesEqual(a: AttributeValue, b: AttributeValue): boolean {
  if (a.S !== undefined) return a.S === b.S
  if (a.N !== undefined) return b.N !== undefined && canonicalNumber(a.N) === canonicalNumber(b.N)
  if (a.B !== undefined) return b.B !== undefined && Buffer.compare(a.B, b.B) === 0
  if (a.BOOL !== undefined) return a.BOOL === b.BOOL
  if (a.NULL !== undefined) return b.NULL !== undefined
  return JSON.stringify(a) === JSON.stringify(b)
}

/**
 * Orders two key attributes of the same type. Strings and bytes compare
 * bytewise, numbers numerically.
 */
export function compareKeyAttributes(a: AttributeValue, b: AttributeValue): number {
  if (a.S !== undefined && b.S !== undefined) {
    return Buffer.compare(Buffer.from(a.S, "utf8"), Buffer.from(b.S, "utf8"))
  }
  if (a.N !== undefined && b.N !== undefined) return compareNumbers(a.N, b.N)
  if (a.B !== undefined && b.B !== undefined) return Buffer.compare(a.B, b.B)
  return attributeType(a).localeCompare(attributeType(b))
}
