import { type AppError, type ErrorCode, isAppError } from "@mailstop/errors"
import type { ContentfulStatusCode } from "hono/utils/http-status"

export type ErrorMapping = {
  status: ContentfulStatusCode
  /** Sent to the client; keep provider and internal details out of it. */
  message: string
  /** Send the error's own message instead, for messages written for clients. */
  exposeMessage?: boolean
}

export type FallbackMapping = {
  code: ErrorCode
  status: ContentfulStatusCode
  message: string
}

export interface ErrorMappingsConfig {
  mappings: Partial<Record<ErrorCode, ErrorMapping>>

  /** Status and message for anything unmapped. An unmapped `AppError` keeps its code. */
  fallback?: FallbackMapping

  /** Extra body fields taken from the error context, e.g. the email address. */
  transformContext?: (error: AppError) => Record<string, unknown> | undefined
}

export type ErrorResponseBody = {
  status: ContentfulStatusCode
  code: ErrorCode
  message: string
  requestId: string
  [key: string]: unknown
}

export type ErrorResponse = {
  error: ErrorResponseBody
}

export type ErrorFormatter = (error: unknown, requestId: string) => ErrorResponse

const INTERNAL_ERROR: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "An unexpected error occurred",
}

export function createErrorFormatter(config: ErrorMappingsConfig): ErrorFormatter {
  const fallback = config.fallback ?? INTERNAL_ERROR

  return (error, requestId) => {
    if (!isAppError(error)) return { error: { ...fallback, requestId } }

    const mapping = config.mappings[error.code]
    const message = mapping?.exposeMessage ? error.message : (mapping?.message ?? fallback.message)

    return {
      error: {
        ...config.transformContext?.(error),
        status: mapping?.status ?? fallback.status,
        code: error.code,
        message,
        requestId,
      },
    }
  }
}
