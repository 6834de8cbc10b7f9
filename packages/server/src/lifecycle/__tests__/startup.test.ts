import type { Logger } from "@mailstop/logger"
import { type MockProxy, mock } from "vitest-mock-extended"
import { startup } from "../startup"

describe("startup", () => {
  let logger: MockProxy<Logger>

  beforeEach(() => {
    logger = mock<Logger>()
  })

  it("is ok when every start hook succeeds", async () => {
    const res = await startup({
      now: () => 0,
      logger,
      deadlineMs: 10_000,
      startHooks: [{ name: "banner", fn: async () => {} }],
    })

    expect(res).toStrictEqual({ ok: true, failures: [], timedOut: false })
    expect(logger.debug).toHaveBeenCalledWith("Running startup hooks")
  })

  it("fails fast on the first failing hook", async () => {
    const later = vi.fn(async () => {})

    const res = await startup({
      now: () => 0,
      logger,
      deadlineMs: 10_000,
      startHooks: [
        {
          name: "provider",
          fn: async () => {
            throw new Error("no credentials")
          },
        },
        { name: "banner", fn: later },
      ],
    })

    expect(later).not.toHaveBeenCalled()
    expect(res.ok).toBe(false)
    expect(res.failures.map((f) => f.hook)).toStrictEqual(["provider"])
  })

  it("is not ok when the deadline has already passed", async () => {
    const res = await startup({
      now: () => 1_000,
      logger,
      deadlineMs: 1_000,
      startHooks: [{ name: "banner", fn: async () => {} }],
    })

    expect(res).toStrictEqual({ ok: false, failures: [], timedOut: true })
  })
})
