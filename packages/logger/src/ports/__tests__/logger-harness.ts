import { levelFromLabel } from "../../core/levels"
import type { CorrelationReader } from "../correlation"
import type { LineWriter } from "../line-writer"
import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"
import type { LoggerOptions } from "../logger-options"

export type CapturedLog = {
  level: LogLevelName
  payload: Record<string, unknown>
}

export type HarnessDeps = {
  destination: LineWriter
  correlation: CorrelationReader
}

export type LoggerHarness = {
  name: string
  make: (
    opts?: Partial<LoggerOptions> & { correlationId?: string; destination?: LineWriter },
  ) => {
    logger: Logger
    lines: string[]
    read: () => CapturedLog[]
    clear: () => void
  }
}

export function createLoggerHarness(
  name: string,
  build: (deps: HarnessDeps, opts: Partial<LoggerOptions>) => Logger,
): LoggerHarness {
  return {
    name,
    make: ({ correlationId, destination: override, ...opts } = {}) => {
      const lines: string[] = []

      const destination: LineWriter = override ?? {
        write: (chunk: string) => lines.push(chunk),
      }

      const correlation: CorrelationReader = { get: () => correlationId }

      return {
        logger: build({ destination, correlation }, { level: "debug", format: "json", ...opts }),
        lines,
        read: () => lines.map(parseLine),
        clear: () => {
          lines.length = 0
        },
      }
    },
  }
}

function parseLine(line: string): CapturedLog {
  const parsed: unknown = JSON.parse(line)

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Not a JSON object: ${line}`)
  }

  const payload = Object.fromEntries(Object.entries(parsed))

  return { level: levelFromLabel(payload.level) ?? "info", payload }
}
