import type { LogLevelName } from "./log-level"

const logFormats = ["json", "text"] as const

export type LogFormat = (typeof logFormats)[number]

/** Minimum level per logger name, applied on top of `LoggerOptions.level`. */
export type ChannelLevels = Readonly<Record<string, LogLevelName>>

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * Adapters (console, pino) must honor these the same way: records below
 * `level` are dropped and `format` picks JSON lines or human text lines.
 */
export type LoggerOptions = {
  /** Minimum level to emit. */
  level: LogLevelName

  /** `json` for machine ingestion, `text` for `<time> - <logger> - <LEVEL> - <message>`. */
  format: LogFormat

  /** Raised thresholds for noisy channels (e.g. access logs). */
  channels?: ChannelLevels
}
