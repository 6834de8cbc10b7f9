import { type LogLevelName, LogLevels, logLevelNames } from "../ports/log-level"
import type { LogFormat, LoggerOptions } from "../ports/logger-options"

export const LEVEL_SEVERITY: Record<LogLevelName, number> = {
  debug: LogLevels.Debug,
  info: LogLevels.Info,
  warning: LogLevels.Warning,
  error: LogLevels.Error,
}

export const LEVEL_LABELS: Record<LogLevelName, string> = {
  debug: "DEBUG",
  info: "INFO",
  warning: "WARNING",
  error: "ERROR",
}

const LEVEL_ALIASES: Record<string, LogLevelName> = {
  trace: "debug",
  warn: "warning",
  critical: "error",
  fatal: "error",
}

export const DEFAULT_LOG_LEVEL: LogLevelName = "info"

export function isLogLevelName(value: unknown): value is LogLevelName {
  return typeof value === "string" && logLevelNames.some((name) => name === value)
}

/**
 * Case-insensitive level parsing with a fallback to INFO for anything
 * unrecognised (`"verbose"`, `""`, `undefined`).
 */
export function parseLogLevel(value: unknown): LogLevelName {
  if (typeof value !== "string") return DEFAULT_LOG_LEVEL

  const normalized = value.trim().toLowerCase()

  if (isLogLevelName(normalized)) return normalized

  return LEVEL_ALIASES[normalized] ?? DEFAULT_LOG_LEVEL
}

/** `json` selects JSON lines; every other value selects text. */
export function parseLogFormat(value: unknown): LogFormat {
  return typeof value === "string" && value.trim().toLowerCase() === "json" ? "json" : "text"
}

export function isLevelEnabled(level: LogLevelName, minimum: LogLevelName): boolean {
  return LEVEL_SEVERITY[level] >= LEVEL_SEVERITY[minimum]
}

export function maxLevel(a: LogLevelName, b: LogLevelName): LogLevelName {
  return LEVEL_SEVERITY[a] >= LEVEL_SEVERITY[b] ? a : b
}

/**
 * Threshold for a named channel: the configured level, raised to the
 * channel's own minimum when one is declared.
 */
export function channelThreshold(
  options: Pick<LoggerOptions, "level" | "channels">,
  channel: string,
): LogLevelName {
  const raised = options.channels?.[channel]

  return raised ? maxLevel(options.level, raised) : options.level
}

export function levelFromLabel(label: unknown): LogLevelName | undefined {
  if (typeof label !== "string") return undefined

  const normalized = label.toLowerCase()

  return isLogLevelName(normalized) ? normalized : undefined
}
