import { formatRecord } from "../../core/format/format-record"
import { sanitizeFields } from "../../core/format/sanitize-fields"
import { levelFromLabel } from "../../core/levels"
import { reportWriteFailure } from "../../core/report-write-failure"
import type { LineWriter } from "../../ports/line-writer"
import type { LogRecord } from "../../ports/log-record"
import type { LogFormat } from "../../ports/logger-options"

/**
 * Sits between pino and the real writer: each pino JSON line is parsed
 * back into a record and rendered by the shared formatter, so both
 * drivers emit the same keys in the same order. Lines that are not pino
 * JSON pass through unchanged.
 */
export class RecordLineDestination implements LineWriter {
  constructor(
    private readonly target: LineWriter,
    private readonly format: LogFormat,
  ) {}

  write(chunk: string): void {
    const record = parsePinoLine(chunk)
    const line = record ? formatRecord(record, this.format) : chunk.trimEnd()

    try {
      this.target.write(`${line}\n`)
    } catch (err) {
      reportWriteFailure(err)
    }
  }
}

function parsePinoLine(chunk: string): LogRecord | undefined {
  let parsed: unknown

  try {
    parsed = JSON.parse(chunk)
  } catch {
    return undefined
  }

  if (!isRecord(parsed)) return undefined

  const { timestamp, level, logger, message, request_id, exception, ...fields } = parsed

  return {
    timestamp: typeof timestamp === "string" ? new Date(timestamp) : new Date(),
    level: levelFromLabel(level) ?? "info",
    logger: typeof logger === "string" ? logger : "",
    message: typeof message === "string" ? message : "",
    ...(typeof request_id === "string" && { requestId: request_id }),
    fields: sanitizeFields(fields),
    ...(typeof exception === "string" && { exception }),
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
