import { BaseError } from "../../base-error"
import { toAppError } from "../to-app-error"

describe("toAppError", () => {
  it("returns an AppError unchanged", () => {
    const err = new BaseError("original", { code: "original" })

    expect(toAppError(err)).toBe(err)
  })

  it("wraps a plain Error as non-operational", () => {
    const err = new Error("unexpected")
    const result = toAppError(err)

    expect(result).toBeInstanceOf(BaseError)
    expect(result.message).toBe("unexpected")
    expect(result.cause).toBe(err)
    expect(result.code).toBe("unknown")
    expect(result.isOperational).toBe(false)
  })

  it("uses the fallback code", () => {
    expect(toAppError(new Error("read failed"), "config_unreadable").code).toBe(
      "config_unreadable",
    )
  })

  it("wraps a thrown string as the message", () => {
    const result = toAppError("boom")

    expect(result.message).toBe("boom")
    expect(result.context).toEqual({})
  })

  it("keeps other thrown values in context", () => {
    const result = toAppError(7)

    expect(result.message).toBe("Unknown error")
    expect(result.context).toEqual({ value: 7 })
  })
})
