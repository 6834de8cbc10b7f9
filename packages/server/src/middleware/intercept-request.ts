import type { CorrelationStore, Logger } from "@mailstop/logger"

export type InterceptedRequest = {
  method: string
  path: string
  /** Omitted from the log record when unknown. */
  clientHost?: string | undefined
}

export type InterceptorDeps = {
  logger: Logger
  correlation: CorrelationStore
  generateId: () => string
  /** Monotonic milliseconds. @default performance.now */
  now?: () => number
}

/**
 * Runs `handler` as one request: installs a fresh correlation id, logs
 * entry and exit with timing, and clears the id on every exit path.
 *
 * A rejected handler is logged at ERROR and its error rethrown unchanged.
 */
export function interceptRequest<R extends { status: number }>(
  deps: InterceptorDeps,
  request: InterceptedRequest,
  handler: (requestId: string) => Promise<R>,
): Promise<R> {
  const { logger, correlation } = deps
  const now = deps.now ?? (() => performance.now())

  return correlation.run(async () => {
    const start = now()
    const { method, path, clientHost } = request

    try {
      const requestId = deps.generateId()
      correlation.set(requestId)

      logger.info("Request received", {
        method,
        path,
        ...(clientHost !== undefined && { client_host: clientHost }),
      })

      let result: R

      try {
        result = await handler(requestId)
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err)

        logger.error(`Request failed: ${message}`, {
          method,
          path,
          duration_ms: Math.round(now() - start),
          error: message,
          err,
        })

        throw err
      }

      logger.info("Request completed", {
        method,
        path,
        status_code: result.status,
        duration_ms: Math.round(now() - start),
      })

      return result
    } finally {
      correlation.clear()
    }
  })
}
