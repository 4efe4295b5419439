import { InvalidCursorError, UnsupportedCursorAttributeError } from "../../errors"
import { decodeCursor, encodeCursor } from "../cursor-codec"

describe("cursor codec", () => {
  it("encodes an absent or empty key as the empty string", () => {
    expect(encodeCursor(undefined)).toBe("")
    expect(encodeCursor({})).toBe("")
  })

  it("encodes unpadded base64url JSON of the string values", () => {
    const cursor = encodeCursor({ id: { S: "P" }, name: { S: "item/2" } })

    expect(cursor).toBe(Buffer.from('{"id":"P","name":"item/2"}').toString("base64url"))
    expect(cursor).not.toContain("=")
  })

  it("decodes back to the original key", () => {
    const key = { id: { S: "tenant-1" }, name: { S: "doc/ü?&" }, created: { S: "2024-01-01" } }

    expect(decodeCursor(encodeCursor(key))).toStrictEqual(key)
  })

  it("refuses to encode non-string key attributes", () => {
    expect(() => encodeCursor({ id: { S: "P" }, rank: { N: "3" } })).toThrow(
      UnsupportedCursorAttributeError,
    )
    expect(() => encodeCursor({ id: { S: "P" }, rank: { N: "3" } })).toThrow(
      'attribute "rank" has type N',
    )
  })

  it.each([
    ["characters outside base64url", "abc+/="],
    ["base64url that is not JSON", Buffer.from("not json").toString("base64url")],
    ["JSON that is not an object", Buffer.from("[1,2]").toString("base64url")],
    ["non-string values", Buffer.from('{"id":1}').toString("base64url")],
    ["an empty object", Buffer.from("{}").toString("base64url")],
  ])("rejects %s", (_label, cursor) => {
    expect(() => decodeCursor(cursor)).toThrow(InvalidCursorError)
  })
})
