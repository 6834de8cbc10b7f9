import { isOperationalError } from "@mailstop/errors"
import type { CorrelationStore, Logger } from "@mailstop/logger"
import { HTTPException } from "hono/http-exception"
import type { Middleware } from "../create-server"
import { REQUEST_LOGGER_NAME } from "../errors/create-error-handler"
import type { ResolvedRequestIdConfig } from "../server-options"
import { interceptRequest } from "./intercept-request"
import { setHeaderIfMissing } from "./utils/set-header-if-missing"

export type RequestInterceptorDeps = {
  logger: Logger
  correlation: CorrelationStore
}

/**
 * Hono adapter for {@link interceptRequest}.
 *
 * - attaches the generated id to the context and the response header
 * - operational errors, already answered by the error handler, complete
 *   the request; any other error that reached the error handler fails it
 */
export function requestInterceptorMiddleware(
  config: ResolvedRequestIdConfig,
  deps: RequestInterceptorDeps,
): Middleware {
  const headerName = config.header.toLowerCase()
  const logger = deps.logger.child({ logger: REQUEST_LOGGER_NAME })

  return async (c, next) => {
    const clientHost = c.get("clientIp")

    try {
      await interceptRequest(
        { logger, correlation: deps.correlation, generateId: config.generate },
        { method: c.req.method, path: c.req.path, clientHost },
        async (requestId) => {
          c.set("requestId", requestId)

          await next()

          setHeaderIfMissing(c.res.headers, headerName, requestId)

          if (c.error !== undefined && !isHandledError(c.error)) throw c.error

          return c.res
        },
      )
    } catch (err) {
      // The error handler has already rendered c.error; rethrowing it would render it twice.
      if (err !== c.error) throw err
    }
  }
}

function isHandledError(err: Error): boolean {
  return isOperationalError(err) || err instanceof HTTPException
}
