import { CorrelationContext } from "../../../core/correlation/correlation-context"
import { ConsoleLogger } from "../console-logger"

describe("ConsoleLogger behavior", () => {
  function makeWriter() {
    const lines: string[] = []

    return { lines, writer: { write: (chunk: string) => lines.push(chunk) } }
  }

  const fixedNow = () => new Date("2024-03-05T07:08:09.123Z")

  it("formats JSON with the injected clock", () => {
    const { lines, writer } = makeWriter()

    const logger = new ConsoleLogger({ writer, now: fixedNow }, { level: "debug" })

    logger.debug("hello")

    expect(lines).toStrictEqual([
      '{"timestamp":"2024-03-05T07:08:09.123Z","level":"DEBUG","logger":"root","message":"hello"}\n',
    ])
  })

  it("formats text with a UTC second-precision timestamp", () => {
    const { lines, writer } = makeWriter()

    const logger = new ConsoleLogger(
      { writer, now: fixedNow },
      { level: "debug", format: "text" },
      { logger: "app" },
    )

    logger.warning("careful", { ignored: true })

    expect(lines).toStrictEqual(["2024-03-05 07:08:09 - app - WARNING - careful\n"])
  })

  it("reads the correlation id from the store at write time", () => {
    const { lines, writer } = makeWriter()
    const correlation = new CorrelationContext()

    const logger = new ConsoleLogger({ writer, correlation, now: fixedNow }, { level: "info" })

    correlation.run(() => {
      correlation.set("ab12cd34")
      logger.info("inside")
    })
    logger.info("outside")

    expect(lines.map((l) => JSON.parse(l).request_id)).toStrictEqual(["ab12cd34", undefined])
  })

  it("defaults to INFO when no minimum level is configured", () => {
    const { lines, writer } = makeWriter()

    const logger = new ConsoleLogger({ writer })

    logger.debug("ignored")
    logger.info("included")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "").message).toBe("included")
  })

  it("stringifies values JSON cannot represent instead of throwing", () => {
    const { lines, writer } = makeWriter()

    const logger = new ConsoleLogger({ writer, now: fixedNow }, { level: "info" })

    const circular: Record<string, unknown> = { a: 1 }
    circular.self = circular

    logger.info("odd extras", { circular, count: 10n })

    expect(JSON.parse(lines[0] ?? "")).toStrictEqual({
      timestamp: "2024-03-05T07:08:09.123Z",
      level: "INFO",
      logger: "root",
      message: "odd extras",
      circular: "[object Object]",
      count: "10",
    })
  })

  it("drops undefined extras", () => {
    const { lines, writer } = makeWriter()

    const logger = new ConsoleLogger({ writer }, { level: "info" })

    logger.info("hello", { a: undefined, b: 1 })

    const payload = JSON.parse(lines[0] ?? "")

    expect(payload.b).toBe(1)
    expect(Object.hasOwn(payload, "a")).toBe(false)
  })

  it("reports a failing write on stderr without throwing", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true)

    const logger = new ConsoleLogger(
      {
        writer: {
          write: () => {
            throw new Error("EPIPE")
          },
        },
      },
      { level: "info" },
    )

    expect(() => logger.info("lost")).not.toThrow()
    expect(stderr).toHaveBeenCalledWith("Failed to write log record: EPIPE\n")
  })
})
