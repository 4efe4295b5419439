import type { AttributeValue } from "@aws-sdk/client-dynamodb"
import { z } from "zod"

import { attributeType } from "../codec/attribute-values"
import { InvalidCursorError, UnsupportedCursorAttributeError } from "../errors"

const cursorPayloadSchema = z.record(z.string(), z.string())

/**
 * Encodes a continuation key as unpadded base64url over a JSON object of
 * attribute name to string value. An absent or empty key encodes to `""`.
 *
 * @throws {UnsupportedCursorAttributeError} when a key attribute is not a string
 */
export function encodeCursor(lastEvaluatedKey: Record<string, AttributeValue> | undefined): string {
  if (!lastEvaluatedKey) return ""

  const projected: Record<string, string> = {}

  for (const [name, attr] of Object.entries(lastEvaluatedKey)) {
    if (attr.S === undefined) throw new UnsupportedCursorAttributeError(name, attributeType(attr))
    projected[name] = attr.S
  }

  if (Object.keys(projected).length === 0) return ""

  return Buffer.from(JSON.stringify(projected), "utf8").toString("base64url")
}

/**
 * Reverses {@link encodeCursor}. Every entry comes back as a string attribute.
 *
 * @throws {InvalidCursorError} when the cursor is not one this codec produced
 */
export function decodeCursor(cursor: string): Record<string, AttributeValue> {
  if (!/^[A-Za-z0-9_-]+$/.test(cursor)) {
    throw new InvalidCursorError("not base64url")
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(Buffer.from(cursor, "base64url").toString("utf8"))
  } catch (err) {
    throw new InvalidCursorError("not JSON", err)
  }

  const result = cursorPayloadSchema.safeParse(parsed)
  if (!result.success) {
    throw new InvalidCursorError("not a map of strings", result.error)
  }
  if (Object.keys(result.data).length === 0) {
    throw new InvalidCursorError("empty key")
  }

  return Object.fromEntries(
    Object.entries(result.data).map(([name, value]): [string, AttributeValue] => [name, { S: value }]),
  )
}
