import type { LogLevelName } from "./log-level"
import type { LogFields } from "./log-meta"

/** Keys owned by the record itself; extras using them are dropped. */
export const RESERVED_RECORD_KEYS = [
  "timestamp",
  "level",
  "logger",
  "message",
  "request_id",
  "exception",
] as const

export type LogRecord = Readonly<{
  timestamp: Date
  level: LogLevelName
  logger: string
  message: string
  requestId?: string
  fields: Readonly<LogFields>
  exception?: string
}>
