import type { LogBindings, LogMeta } from "./log-meta"

export interface Logger {
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warning(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void

  /**
   * Creates a child logger that inherits the parent bindings and adds
   * `bindings` to every record it emits.
   *
   * Binding `logger` renames the channel; the child then filters with the
   * channel's threshold (never lower than the configured minimum level).
   */
  child(bindings: LogBindings): Logger
}
