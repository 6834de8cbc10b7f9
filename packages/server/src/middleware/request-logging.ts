import type { Logger } from "@mailstop/logger"
import { routePath } from "hono/route"
import type { Middleware } from "../create-server"
import type { EnabledRequestLoggingConfig, PathString } from "../server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"

export const ACCESS_LOGGER_NAME = "http.access"

/**
 * One access line per response on the `http.access` channel.
 *
 * Policy:
 * - 5xx => error
 * - else => config.level
 */
export function requestLoggingMiddleware(
  config: Required<EnabledRequestLoggingConfig>,
  baseLogger: Logger,
): Middleware {
  const logger = baseLogger.child({ logger: ACCESS_LOGGER_NAME })

  return async (c, next) => {
    const path = c.req.path

    if (shouldIgnore(path, config.ignorePaths)) {
      await next()
      return
    }

    const start = performance.now()

    try {
      await next()
    } finally {
      const status = c.res.status
      const durationMs = Math.round(performance.now() - start)

      const clientIp = c.get("clientIp")
      const userAgent = c.req.header("user-agent")

      const method = c.req.method
      const matched = routePath(c)
      const route = isNonEmptyString(matched) ? matched : path

      const meta = {
        method,
        path,
        route,
        status_code: status,
        duration_ms: durationMs,

        ...(clientIp !== undefined && { client_ip: clientIp }),
        ...(userAgent !== undefined && { user_agent: userAgent }),
      }

      const line = `${method} ${route} ${status}`

      if (status >= 500) {
        logger.error(line, meta)
      } else {
        logger[config.level](line, meta)
      }
    }
  }
}

function shouldIgnore(path: string, ignorePaths: PathString[]): boolean {
  return ignorePaths.some((ignored) => path === ignored || path.startsWith(`${ignored}/`))
}
