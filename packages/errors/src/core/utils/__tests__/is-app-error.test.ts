import { BaseError } from "../../base-error"
import { isAppError } from "../is-app-error"

describe("isAppError", () => {
  it("accepts BaseError instances", () => {
    expect(isAppError(new BaseError("x", { code: "x" }))).toBe(true)
  })

  it("rejects plain errors and non-errors", () => {
    expect(isAppError(new Error("x"))).toBe(false)
    expect(isAppError({ code: "x", context: {}, isRetryable: false })).toBe(false)
    expect(isAppError(null)).toBe(false)
  })
})
