export type LogFields = Record<string, unknown>

export type LogEvent = {
  /** Thrown value rendered into the record's `exception` text. */
  err?: unknown
}

/** Per-call extras; merged at the top level of the emitted record. */
export type LogMeta = LogEvent & LogFields

/**
 * Fields bound to a logger by `child()`.
 * `logger` names the channel and selects its threshold.
 */
export type LogBindings = { logger?: string } & LogFields
