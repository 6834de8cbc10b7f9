import { channelThreshold, isLevelEnabled, levelFromLabel, parseLogFormat, parseLogLevel } from "../levels"

describe("parseLogLevel", () => {
  it.each([
    ["DEBUG", "debug"],
    ["info", "info"],
    [" Warning ", "warning"],
    ["warn", "warning"],
    ["ERROR", "error"],
    ["critical", "error"],
    ["fatal", "error"],
    ["trace", "debug"],
  ] as const)("parses %j as %s", (input, expected) => {
    expect(parseLogLevel(input)).toBe(expected)
  })

  it.each(["verbose", "", undefined, 42])("falls back to info for %j", (input) => {
    expect(parseLogLevel(input)).toBe("info")
  })
})

describe("parseLogFormat", () => {
  it.each([
    ["json", "json"],
    ["JSON", "json"],
    ["text", "text"],
    ["pretty", "text"],
    [undefined, "text"],
  ] as const)("maps %j to %s", (input, expected) => {
    expect(parseLogFormat(input)).toBe(expected)
  })
})

describe("isLevelEnabled", () => {
  it("orders DEBUG < INFO < WARNING < ERROR", () => {
    expect(isLevelEnabled("debug", "info")).toBe(false)
    expect(isLevelEnabled("info", "info")).toBe(true)
    expect(isLevelEnabled("warning", "info")).toBe(true)
    expect(isLevelEnabled("warning", "error")).toBe(false)
  })
})

describe("channelThreshold", () => {
  const channels = { "http.access": "warning" } as const

  it("raises a declared channel", () => {
    expect(channelThreshold({ level: "info", channels }, "http.access")).toBe("warning")
  })

  it("keeps the configured level when it is higher", () => {
    expect(channelThreshold({ level: "error", channels }, "http.access")).toBe("error")
  })

  it("uses the configured level for other channels", () => {
    expect(channelThreshold({ level: "debug", channels }, "app")).toBe("debug")
  })
})

describe("levelFromLabel", () => {
  it("reads upper-case labels", () => {
    expect(levelFromLabel("WARNING")).toBe("warning")
    expect(levelFromLabel("WARN")).toBeUndefined()
    expect(levelFromLabel(30)).toBeUndefined()
  })
})
