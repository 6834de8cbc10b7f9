import type { LogBindings, LogMeta } from "../../ports/log-meta"
import type { Logger } from "../../ports/logger"

export class NullLogger implements Logger {
  debug(_message: string, _meta?: LogMeta): void {}

  info(_message: string, _meta?: LogMeta): void {}

  warning(_message: string, _meta?: LogMeta): void {}

  error(_message: string, _meta?: LogMeta): void {}

  child(_bindings: LogBindings): Logger {
    return this
  }
}
