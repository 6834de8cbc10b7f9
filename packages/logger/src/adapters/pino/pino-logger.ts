import { describeError } from "@mailstop/errors"
import pino, {
  type DestinationStream,
  type Level as PinoLevel,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { correlation as defaultCorrelation } from "../../core/correlation/correlation-context"
import { hasError } from "../../core/format/build-record"
import { sanitizeFields } from "../../core/format/sanitize-fields"
import { channelThreshold, DEFAULT_LOG_LEVEL, LEVEL_LABELS } from "../../core/levels"
import { reportWriteFailure } from "../../core/report-write-failure"
import type { CorrelationReader } from "../../ports/correlation"
import type { LineWriter } from "../../ports/line-writer"
import type { LogLevelName } from "../../ports/log-level"
import type { LogBindings, LogFields, LogMeta } from "../../ports/log-meta"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"
import { ROOT_LOGGER_NAME } from "../console/console-logger"
import { RecordLineDestination } from "./record-line-destination"

export type PinoLoggerDeps = {
  /** @default stdout via `pino.destination` */
  destination?: LineWriter
  /** @default the process-wide correlation store */
  correlation?: CorrelationReader
}

type PinoParent = {
  logger: PinoLoggerBase
  name: string
  level: LogLevelName
  fields: LogFields
}

const PINO_LEVELS: Record<LogLevelName, PinoLevel> = {
  debug: "debug",
  info: "info",
  warning: "warn",
  error: "error",
}

const PINO_LABELS: Record<string, string> = {
  debug: LEVEL_LABELS.debug,
  info: LEVEL_LABELS.info,
  warn: LEVEL_LABELS.warning,
  error: LEVEL_LABELS.error,
}

let stdout: DestinationStream | undefined

/** Shared synchronous stdout stream; never closed, since it owns fd 1. */
function stdoutDestination(): DestinationStream {
  if (!stdout) stdout = pino.destination({ dest: 1, sync: true })

  return stdout
}

export class PinoLogger implements Logger {
  protected readonly logger: PinoLoggerBase
  protected readonly opts: LoggerOptions
  private readonly name: string
  private readonly level: LogLevelName
  /** Kept here rather than as pino bindings, so extras can replace them. */
  private readonly fields: LogFields

  constructor(
    private readonly deps: PinoLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
    bindings: LogBindings = {},
    parent?: PinoParent,
  ) {
    this.opts = {
      level: opts.level ?? DEFAULT_LOG_LEVEL,
      format: opts.format ?? "json",
      ...(opts.channels && { channels: opts.channels }),
    }

    const { logger: name, ...fields } = bindings

    this.name = name ?? parent?.name ?? ROOT_LOGGER_NAME
    this.level =
      name !== undefined ? channelThreshold(this.opts, name) : (parent?.level ?? this.opts.level)
    this.fields = { ...parent?.fields, ...sanitizeFields(fields) }
    this.logger = this.init(parent)
  }

  private init(parent?: PinoParent): PinoLoggerBase {
    if (parent) return parent.logger.child({}, { level: PINO_LEVELS[this.level] })

    const correlation = this.deps.correlation ?? defaultCorrelation

    const pinoOpts: PinoOptions = {
      level: PINO_LEVELS[this.level],
      base: null,
      messageKey: "message",
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
      formatters: {
        level: (label) => ({ level: PINO_LABELS[label] ?? label.toUpperCase() }),
      },
      mixin: () => {
        const requestId = correlation.get()

        return requestId === undefined ? {} : { request_id: requestId }
      },
    }

    const target = this.deps.destination ?? stdoutDestination()

    return pino(pinoOpts, new RecordLineDestination(target, this.opts.format))
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta): void {
    const { err, ...extras }: LogMeta = meta ?? {}

    const payload = {
      logger: this.name,
      ...sanitizeFields({ ...this.fields, ...extras }),
      ...(hasError(err) && { exception: describeError(err) }),
    }

    try {
      this.logger[PINO_LEVELS[level]](payload, message)
    } catch (failure) {
      reportWriteFailure(failure)
    }
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

  child(bindings: LogBindings): Logger {
    return new PinoLogger(this.deps, this.opts, bindings, {
      logger: this.logger,
      name: this.name,
      level: this.level,
      fields: this.fields,
    })
  }
}

