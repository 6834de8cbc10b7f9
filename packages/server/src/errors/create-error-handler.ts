import { isOperationalError } from "@mailstop/errors"
import type { Logger } from "@mailstop/logger"
import type { ErrorHandler as HonoErrorHandler } from "hono"
import { routePath } from "hono/route"
import { isNonEmptyString } from "../middleware/utils/is-non-empty-string"
import type { ResolvedServerOptions } from "../server-options"
import { createErrorFormatter, type ErrorMappingsConfig } from "./errors"

export type ErrorHandler = HonoErrorHandler

export const REQUEST_LOGGER_NAME = "http.request"

export function createErrorHandler(config: ResolvedServerOptions, logger: Logger): ErrorHandler {
  const { errorHandling } = config

  if (errorHandling.kind === "handler") return errorHandling.errorHandler

  return mappedErrorHandler(errorHandling.config, logger.child({ logger: REQUEST_LOGGER_NAME }))
}

/**
 * Answers with the mapped envelope. Operational errors are logged here:
 * 5xx at ERROR with the error, 4xx at INFO with the error at DEBUG. Other
 * errors are left to the request interceptor, which fails the request.
 */
function mappedErrorHandler(mappings: ErrorMappingsConfig, logger: Logger): ErrorHandler {
  const format = createErrorFormatter(mappings)

  return (err, c) => {
    const body = format(err, c.get("requestId") ?? "unknown")
    const { status, code } = body.error

    if (isOperationalError(err)) {
      const matched = routePath(c)
      const route = isNonEmptyString(matched) ? matched : c.req.path
      const meta = { method: c.req.method, route, status, code, op: `${c.req.method} ${route}` }

      if (status >= 500) {
        logger.error("Request error", { ...meta, err })
      } else {
        logger.info("Request rejected", meta)
        logger.debug("Request rejected details", { ...meta, err })
      }
    }

    return c.json(body, { status })
  }
}
