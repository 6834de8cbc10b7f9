export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (ids, inputs, upstream codes).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /**
   * `true` for expected failures such as an address that is not suppressed
   * or a provider that rejected the call; `false` for bugs. The HTTP layer
   * answers operational errors with their mapped status and reports the
   * rest as failed requests.
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/** JSON form of an error for payloads and log fields. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
