import { isNonEmptyString } from "../is-non-empty-string"

describe("isNonEmptyString", () => {
  it.each(["/api/v1/email-suppression/:email", " 203.0.113.7 "])("accepts %j", (value) => {
    expect(isNonEmptyString(value)).toBe(true)
  })

  it.each(["", "   ", "\t\n", undefined, null, 0, {}])("rejects %j", (value) => {
    expect(isNonEmptyString(value)).toBe(false)
  })
})
