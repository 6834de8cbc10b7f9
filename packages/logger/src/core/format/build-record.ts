import { describeError } from "@mailstop/errors"
import type { LogLevelName } from "../../ports/log-level"
import type { LogFields, LogMeta } from "../../ports/log-meta"
import type { LogRecord } from "../../ports/log-record"
import { sanitizeFields } from "./sanitize-fields"

export type RecordInput = {
  timestamp: Date
  level: LogLevelName
  logger: string
  message: string
  correlationId?: string | undefined
  bindings: LogFields
  meta?: LogMeta | undefined
}

export function hasError(err: unknown): boolean {
  return err !== undefined && err !== null
}

/**
 * Assembles an immutable record from logger state and per-call extras.
 * Per-call extras override bindings; `err` becomes the `exception` text.
 */
export function buildRecord(input: RecordInput): LogRecord {
  const { err, ...extras }: LogMeta = input.meta ?? {}

  return {
    timestamp: input.timestamp,
    level: input.level,
    logger: input.logger,
    message: input.message,
    ...(input.correlationId !== undefined && { requestId: input.correlationId }),
    fields: sanitizeFields({ ...input.bindings, ...extras }),
    ...(hasError(err) && { exception: describeError(err) }),
  }
}
