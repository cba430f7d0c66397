import { BaseError } from "../../base-error"
import { isAppError } from "../is-app-error"

describe("isAppError", () => {
  it("accepts BaseError instances", () => {
    expect(isAppError(new BaseError("x", { code: "codec_failed" }))).toBe(true)
  })

  it("accepts structurally matching errors", () => {
    const err = Object.assign(new Error("x"), {
      code: "store_unavailable",
      context: {},
      isRetryable: true,
      isOperational: true,
      timestamp: new Date(),
    })

    expect(isAppError(err)).toBe(true)
  })

  it("rejects plain errors", () => {
    expect(isAppError(new Error("x"))).toBe(false)
  })

  it("rejects errors with an invalid timestamp", () => {
    const err = Object.assign(new Error("x"), {
      code: "store_unavailable",
      context: {},
      isRetryable: true,
      isOperational: true,
      timestamp: new Date(Number.NaN),
    })

    expect(isAppError(err)).toBe(false)
  })

  it("rejects non-errors", () => {
    expect(isAppError(null)).toBe(false)
    expect(isAppError("store_unavailable")).toBe(false)
    expect(isAppError({ code: "x", context: {} })).toBe(false)
  })
})
