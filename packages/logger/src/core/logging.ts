import { ConsoleLogger } from "../adapters/console/console-logger"
import { PinoLogger } from "../adapters/pino/pino-logger"
import type { CorrelationReader } from "../ports/correlation"
import type { LineWriter } from "../ports/line-writer"
import type { LogLevelName } from "../ports/log-level"
import type { LogBindings, LogFields, LogMeta } from "../ports/log-meta"
import type { Logger } from "../ports/logger"
import type { ChannelLevels, LoggerOptions } from "../ports/logger-options"
import { parseLogFormat, parseLogLevel } from "./levels"

export const logDrivers = ["pino", "console"] as const

export type LogDriver = (typeof logDrivers)[number]

/** Channels whose output is raised above the configured level. */
export const NOISY_CHANNELS: ChannelLevels = {
  "http.access": "warning",
  "http.server": "info",
}

export type LoggingSettings = {
  /** Case-insensitive; unknown values fall back to INFO. */
  level?: string
  /** `json`, anything else selects text. */
  format?: string
  /** @default "pino" */
  driver?: LogDriver
  /** @default stdout */
  destination?: LineWriter
  correlation?: CorrelationReader
  /** @default NOISY_CHANNELS */
  channels?: ChannelLevels
}

type LoggingState = Readonly<{
  root: Logger
  options: LoggerOptions
  driver: LogDriver | "fallback"
}>

const FALLBACK_OPTIONS: LoggerOptions = { level: "warning", format: "text" }

function fallbackState(): LoggingState {
  return {
    root: new ConsoleLogger({ writer: process.stderr }, FALLBACK_OPTIONS),
    options: FALLBACK_OPTIONS,
    driver: "fallback",
  }
}

let state: LoggingState = fallbackState()

function currentRoot(): Logger {
  return state.root
}

/**
 * Logger handle that resolves the process-wide root on every call, so a
 * handle obtained before `configureLogging` follows the later configuration.
 */
class ManagedLogger implements Logger {
  private resolved: { root: Logger; logger: Logger } | undefined

  constructor(private readonly bindings: LogBindings) {}

  private target(): Logger {
    const root = currentRoot()
    const cached = this.resolved

    if (cached && cached.root === root) return cached.logger

    const logger = Object.keys(this.bindings).length > 0 ? root.child(this.bindings) : root

    this.resolved = { root, logger }

    return logger
  }

  debug(message: string, meta?: LogMeta): void {
    this.target().debug(message, meta)
  }

  info(message: string, meta?: LogMeta): void {
    this.target().info(message, meta)
  }

  warning(message: string, meta?: LogMeta): void {
    this.target().warning(message, meta)
  }

  error(message: string, meta?: LogMeta): void {
    this.target().error(message, meta)
  }

  child(bindings: LogBindings): Logger {
    return new ManagedLogger({ ...this.bindings, ...bindings })
  }
}

const rootHandle = new ManagedLogger({})

/**
 * Installs the process-wide sink. Calling it again replaces the previous
 * sink; records are never written to both.
 */
export function configureLogging(settings: LoggingSettings = {}): Logger {
  const options: LoggerOptions = {
    level: parseLogLevel(settings.level),
    format: parseLogFormat(settings.format ?? "json"),
    channels: settings.channels ?? NOISY_CHANNELS,
  }

  const driver = settings.driver ?? "pino"

  const root =
    driver === "console"
      ? new ConsoleLogger(
          {
            ...(settings.destination && { writer: settings.destination }),
            ...(settings.correlation && { correlation: settings.correlation }),
          },
          options,
        )
      : new PinoLogger(
          {
            ...(settings.destination && { destination: settings.destination }),
            ...(settings.correlation && { correlation: settings.correlation }),
          },
          options,
        )

  state = Object.freeze({ root, options, driver })

  return rootHandle
}

/** Named logger bound to the process-wide sink. */
export function getLogger(name: string, bindings: LogFields = {}): Logger {
  return new ManagedLogger({ ...bindings, logger: name })
}

export function log(level: LogLevelName, message: string, extras?: LogFields, err?: unknown): void {
  currentRoot()[level](message, { ...extras, ...(err !== undefined && { err }) })
}

export function currentLoggingOptions(): Readonly<LoggerOptions> & { driver: LoggingState["driver"] } {
  return { ...state.options, driver: state.driver }
}

/** Restores the pre-configuration fallback sink. */
export function resetLogging(): void {
  state = fallbackState()
}
