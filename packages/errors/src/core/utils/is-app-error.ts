import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Structural check for AppError, so errors thrown by other copies of this
 * package (or duck-typed ones) are recognised too.
 *
 * @example
 * ```ts
 * if (isAppError(err) && err.isOperational) {
 *   return c.json({ code: err.code }, 400)
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}

/** True for AppErrors that describe an expected failure. */
export function isOperationalError(e: unknown): e is AppError {
  return isAppError(e) && e.isOperational
}
