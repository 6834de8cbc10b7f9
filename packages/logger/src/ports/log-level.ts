export const logLevelNames = ["debug", "info", "warning", "error"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels (higher = more severe).
 */
export const LogLevels = {
  /** Diagnostic detail useful while investigating. */
  Debug: 10,
  /** Normal operation: requests received and completed, startup banners. */
  Info: 20,
  /** Something unexpected that the process recovered from. */
  Warning: 30,
  /** A failed operation: unhandled request errors, provider failures. */
  Error: 40,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]
