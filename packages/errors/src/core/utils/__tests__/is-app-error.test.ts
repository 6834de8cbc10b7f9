import { BaseError } from "../../base-error"
import { isAppError, isOperationalError } from "../is-app-error"

function duckTyped(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: "ProviderError",
    message: "upstream rejected the call",
    code: "provider_error",
    context: { status: 429 },
    isOperational: true,
    timestamp: new Date(),
    ...overrides,
  }
}

describe("isAppError", () => {
  it("accepts BaseError and its subclasses", () => {
    class SuppressionError extends BaseError<"suppression_not_found"> {}

    expect(isAppError(new BaseError("test", { code: "test" }))).toBe(true)
    expect(isAppError(new SuppressionError("x", { code: "suppression_not_found" }))).toBe(true)
  })

  it("accepts duck-typed objects with every field", () => {
    expect(isAppError(duckTyped())).toBe(true)
  })

  it("rejects primitives and plain errors", () => {
    expect(isAppError(null)).toBe(false)
    expect(isAppError(undefined)).toBe(false)
    expect(isAppError("error")).toBe(false)
    expect(isAppError(500)).toBe(false)
    expect(isAppError(new Error("standard"))).toBe(false)
  })

  it.each(["code", "context", "isOperational", "timestamp", "message", "name"])(
    "rejects objects missing %s",
    (key) => {
      const candidate = duckTyped()
      delete candidate[key]

      expect(isAppError(candidate)).toBe(false)
    },
  )

  it("rejects an invalid timestamp", () => {
    expect(isAppError(duckTyped({ timestamp: new Date("invalid") }))).toBe(false)
  })
})

describe("isOperationalError", () => {
  it("is true only for operational AppErrors", () => {
    expect(isOperationalError(new BaseError("x", { code: "test" }))).toBe(true)
    expect(isOperationalError(new BaseError("x", { code: "test", isOperational: false }))).toBe(
      false,
    )
    expect(isOperationalError(new Error("boom"))).toBe(false)
  })
})
