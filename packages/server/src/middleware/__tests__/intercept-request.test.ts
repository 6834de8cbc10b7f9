import { setTimeout as delay } from "node:timers/promises"
import { CorrelationContext, PinoLogger } from "@mailstop/logger"
import { captureLogger } from "../../tests/capture-logger"
import { interceptRequest } from "../intercept-request"

function clockFrom(...ticks: number[]) {
  return () => ticks.shift() ?? 0
}

describe("interceptRequest", () => {
  it("logs entry and completion with the generated request id", async () => {
    const { logger, correlation, records } = captureLogger()

    const result = await interceptRequest(
      { logger, correlation, generateId: () => "ab12cd34", now: clockFrom(100, 115) },
      { method: "GET", path: "/api/v1/email-suppression/a@example.com", clientHost: "203.0.113.7" },
      async (requestId) => ({ status: 200, requestId }),
    )

    expect(result).toStrictEqual({ status: 200, requestId: "ab12cd34" })
    expect(records()).toStrictEqual([
      {
        timestamp: expect.any(String),
        level: "INFO",
        logger: "root",
        message: "Request received",
        request_id: "ab12cd34",
        method: "GET",
        path: "/api/v1/email-suppression/a@example.com",
        client_host: "203.0.113.7",
      },
      {
        timestamp: expect.any(String),
        level: "INFO",
        logger: "root",
        message: "Request completed",
        request_id: "ab12cd34",
        method: "GET",
        path: "/api/v1/email-suppression/a@example.com",
        status_code: 200,
        duration_ms: 15,
      },
    ])
  })

  it("omits client_host when it is unknown", async () => {
    const { logger, correlation, records } = captureLogger()

    await interceptRequest(
      { logger, correlation, generateId: () => "ab12cd34" },
      { method: "GET", path: "/" },
      async () => ({ status: 200 }),
    )

    expect(records()[0]).not.toHaveProperty("client_host")
  })

  it("logs a failure at ERROR and rethrows the same error", async () => {
    const { logger, correlation, records } = captureLogger()
    const boom = new Error("boom")

    const run = interceptRequest(
      { logger, correlation, generateId: () => "ef56gh78", now: clockFrom(0, 42) },
      { method: "GET", path: "/boom" },
      async () => {
        throw boom
      },
    )

    await expect(run).rejects.toBe(boom)

    const failed = records()[1]

    expect(records()).toHaveLength(2)
    expect(failed).toMatchObject({
      level: "ERROR",
      message: "Request failed: boom",
      request_id: "ef56gh78",
      method: "GET",
      path: "/boom",
      duration_ms: 42,
      error: "boom",
    })
    expect(String(failed?.exception).startsWith("Error: boom\n")).toBe(true)
  })

  it("stringifies non-Error rejections in the message", async () => {
    const { logger, correlation, records } = captureLogger()

    await expect(
      interceptRequest(
        { logger, correlation, generateId: () => "ab12cd34" },
        { method: "DELETE", path: "/x" },
        () => Promise.reject("provider down"),
      ),
    ).rejects.toBe("provider down")

    expect(records()[1]?.message).toBe("Request failed: provider down")
  })

  it.each([
    ["completes", async () => ({ status: 204 })],
    [
      "fails",
      async (): Promise<{ status: number }> => {
        throw new Error("boom")
      },
    ],
  ])("clears the correlation id exactly once when the handler %s", async (_, handler) => {
    const { logger, correlation } = captureLogger()
    const clear = vi.spyOn(correlation, "clear")

    await interceptRequest(
      { logger, correlation, generateId: () => "ab12cd34" },
      { method: "GET", path: "/" },
      handler,
    ).catch(() => undefined)

    expect(clear).toHaveBeenCalledOnce()
  })

  it("clears the correlation id when generating the id fails", async () => {
    const { logger, correlation, records } = captureLogger()
    const clear = vi.spyOn(correlation, "clear")
    const failure = new Error("no entropy")

    const run = interceptRequest(
      {
        logger,
        correlation,
        generateId: () => {
          throw failure
        },
      },
      { method: "GET", path: "/" },
      async () => ({ status: 200 }),
    )

    await expect(run).rejects.toBe(failure)
    expect(clear).toHaveBeenCalledOnce()
    expect(records()).toHaveLength(0)
  })

  it("returns the handler result when the log sink fails", async () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true)
    const correlation = new CorrelationContext()
    const handler = vi.fn(async () => ({ status: 200 }))

    const logger = new PinoLogger(
      {
        destination: {
          write: () => {
            throw new Error("EPIPE")
          },
        },
        correlation,
      },
      { level: "info" },
    )

    const result = await interceptRequest(
      { logger, correlation, generateId: () => "ab12cd34" },
      { method: "GET", path: "/" },
      handler,
    )

    expect(result).toStrictEqual({ status: 200 })
    expect(handler).toHaveBeenCalledOnce()
    expect(stderr).toHaveBeenCalledWith("Failed to write log record: EPIPE\n")
  })

  it("isolates the ids of concurrent requests", async () => {
    const { logger, correlation, records } = captureLogger()
    const ids = ["ab12cd34", "ef56gh78"]

    const handle = (path: string, wait: number) =>
      interceptRequest(
        { logger, correlation, generateId: () => ids.shift() ?? "" },
        { method: "GET", path },
        async () => {
          await delay(wait)
          logger.info("working", { path })
          return { status: 200 }
        },
      )

    await Promise.all([handle("/slow", 20), handle("/fast", 1)])

    const byPath = (path: string) =>
      records()
        .filter((r) => r.path === path)
        .map((r) => r.request_id)

    expect(byPath("/slow")).toStrictEqual(["ab12cd34", "ab12cd34", "ab12cd34"])
    expect(byPath("/fast")).toStrictEqual(["ef56gh78", "ef56gh78", "ef56gh78"])
  })
})
