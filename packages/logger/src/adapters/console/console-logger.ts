import { correlation as defaultCorrelation } from "../../core/correlation/correlation-context"
import { buildRecord } from "../../core/format/build-record"
import { formatRecord } from "../../core/format/format-record"
import { sanitizeFields } from "../../core/format/sanitize-fields"
import { channelThreshold, DEFAULT_LOG_LEVEL, isLevelEnabled } from "../../core/levels"
import { reportWriteFailure } from "../../core/report-write-failure"
import type { CorrelationReader } from "../../ports/correlation"
import type { LineWriter } from "../../ports/line-writer"
import type { LogLevelName } from "../../ports/log-level"
import type { LogBindings, LogFields, LogMeta } from "../../ports/log-meta"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export const ROOT_LOGGER_NAME = "root"

export type ConsoleLoggerDeps = {
  /** @default process.stdout */
  writer?: LineWriter
  /** @default the process-wide correlation store */
  correlation?: CorrelationReader
  now?: () => Date
}

type ConsoleLoggerState = {
  name: string
  level: LogLevelName
  bindings: LogFields
}

/**
 * Dependency-free adapter: builds each record and writes it with a single
 * `write` call on the configured line writer.
 */
export class ConsoleLogger implements Logger {
  private readonly sink: LineWriter
  private readonly opts: LoggerOptions
  private readonly state: ConsoleLoggerState

  constructor(
    private readonly deps: ConsoleLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
    bindings: LogBindings = {},
    parent?: ConsoleLoggerState,
  ) {
    this.sink = deps.writer ?? process.stdout
    this.opts = {
      level: opts.level ?? DEFAULT_LOG_LEVEL,
      format: opts.format ?? "json",
      ...(opts.channels && { channels: opts.channels }),
    }

    const { logger: name, ...fields } = bindings

    this.state = {
      name: name ?? parent?.name ?? ROOT_LOGGER_NAME,
      level:
        name !== undefined
          ? channelThreshold(this.opts, name)
          : (parent?.level ?? this.opts.level),
      bindings: { ...parent?.bindings, ...sanitizeFields(fields) },
    }
  }

  child(bindings: LogBindings): Logger {
    return new ConsoleLogger(this.deps, this.opts, bindings, this.state)
  }

  debug(message: string, meta?: LogMeta): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta): void {
    this.write("info", message, meta)
  }

  warning(message: string, meta?: LogMeta): void {
    this.write("warning", message, meta)
  }

  error(message: string, meta?: LogMeta): void {
    this.write("error", message, meta)
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta): void {
    if (!isLevelEnabled(level, this.state.level)) return

    const record = buildRecord({
      timestamp: this.deps.now?.() ?? new Date(),
      level,
      logger: this.state.name,
      message,
      correlationId: (this.deps.correlation ?? defaultCorrelation).get(),
      bindings: this.state.bindings,
      meta,
    })

    const line = formatRecord(record, this.opts.format)

    try {
      this.sink.write(`${line}\n`)
    } catch (err) {
      reportWriteFailure(err)
    }
  }
}
