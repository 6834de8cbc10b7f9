import { ConsoleLogger } from "@mailstop/logger"
import { createTestHarness, runHooks, testEnv } from "../../../tests/test-harness"
import { createStartHooks, createStopHooks, truncateOcid } from "../index"

function capture() {
  const lines: string[] = []
  const logger = new ConsoleLogger(
    {
      writer: { write: (line: string) => void lines.push(line) },
      now: () => new Date("2024-05-01T08:30:00.000Z"),
    },
    { level: "info", format: "json" },
  )

  return { logger, records: () => lines.map((l) => JSON.parse(l)) }
}

describe("truncateOcid", () => {
  it("keeps short ids whole", () => {
    expect(truncateOcid("ocid1.tenancy")).toBe("ocid1.tenancy")
  })

  it("cuts long ids after 20 characters", () => {
    expect(truncateOcid("ocid1.tenancy.oc1..aaaatestvalue")).toBe("ocid1.tenancy.oc1..a...")
  })
})

describe("lifecycle hooks", () => {
  it("logs the startup banner with the truncated tenancy", async () => {
    const { logger, records } = capture()
    const { ctx } = await createTestHarness({
      env: { ...testEnv, OCI_TENANCY_OCID: "ocid1.tenancy.oc1..aaaatestvalue" },
      coreOverrides: { logger },
    })

    await runHooks(createStartHooks(ctx))

    expect(records()).toStrictEqual([
      {
        timestamp: "2024-05-01T08:30:00.000Z",
        level: "INFO",
        logger: "root",
        message: "Email Suppression Service v1.0.0 starting",
        service: "Email Suppression Service",
        version: "1.0.0",
        environment: "development",
        provider: "memory",
        region: "ap-mumbai-1",
        tenancy: "ocid1.tenancy.oc1..a...",
      },
    ])
  })

  it("leaves the tenancy out when none is configured", async () => {
    const { logger, records } = capture()
    const { ctx } = await createTestHarness({ coreOverrides: { logger } })

    await runHooks(createStartHooks(ctx))

    expect(records()[0]).not.toHaveProperty("tenancy")
  })

  it("logs the shutdown banner", async () => {
    const { logger, records } = capture()
    const { ctx } = await createTestHarness({ coreOverrides: { logger } })

    await runHooks(createStopHooks(ctx))

    expect(records()).toStrictEqual([
      {
        timestamp: "2024-05-01T08:30:00.000Z",
        level: "INFO",
        logger: "root",
        message: "Application shutting down",
        service: "Email Suppression Service",
      },
    ])
  })
})
