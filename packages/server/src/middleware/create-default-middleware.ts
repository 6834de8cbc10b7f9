import type { CorrelationStore, Logger } from "@mailstop/logger"
import type { Middleware } from "../create-server"
import type { ResolvedServerOptions } from "../server-options"
import { clientIpMiddleware } from "./client-ip"
import { requestInterceptorMiddleware } from "./request-interceptor"
import { requestLoggingMiddleware } from "./request-logging"

export type DefaultMiddlewareDeps = {
  logger: Logger
  correlation: CorrelationStore
}

/**
 * Order matters: the client IP is resolved before the interceptor logs
 * "Request received", and the access log runs inside the interceptor's
 * correlation scope.
 */
export function createDefaultMiddleware(
  options: ResolvedServerOptions,
  deps: DefaultMiddlewareDeps,
): Middleware[] {
  const middleware: Middleware[] = [
    clientIpMiddleware(options.clientIp.trustedProxies),
    requestInterceptorMiddleware(options.requestId, deps),
  ]

  if (options.requestLogging.enabled) {
    middleware.push(requestLoggingMiddleware(options.requestLogging, deps.logger))
  }

  return middleware
}
