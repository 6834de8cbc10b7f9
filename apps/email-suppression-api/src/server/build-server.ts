import {
  type Application,
  createServer,
  type ErrorMappingsConfig,
  type LifecycleHook,
  type Middleware,
  type Server,
} from "@mailstop/server"
import { cors } from "hono/cors"
import type { AppContext } from "../app/create-context"

export type BuiltServer = {
  app: Application
  server: Server
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

export const errorMappings: ErrorMappingsConfig = {
  mappings: {
    suppression_not_found: {
      status: 404,
      message: "Email is not in the suppression list",
      exposeMessage: true,
    },
    provider_error: { status: 500, message: "Email provider request failed" },
  },
  transformContext: (err) =>
    typeof err.context.email === "string" ? { email: err.context.email } : undefined,
}

function corsMiddleware(origins: string[], requestIdHeader: string): Middleware {
  const wildcard = origins.length === 0 || origins.includes("*")

  return cors({
    origin: wildcard ? "*" : origins,
    allowMethods: ["GET", "DELETE", "OPTIONS"],
    exposeHeaders: [requestIdHeader],
    credentials: !wildcard,
  })
}

export function buildServer(ctx: AppContext): BuiltServer {
  const startHooks = ctx.createStartHooks(ctx)
  const stopHooks = ctx.createStopHooks(ctx)

  const server = createServer(
    { logger: ctx.services.core.logger },
    {
      host: ctx.config.server.host,
      port: ctx.config.server.port,
      shutdownTimeoutMs: ctx.config.server.shutdownTimeoutMs,

      errorHandling: { kind: "mappings", config: errorMappings },

      requestId: { header: ctx.config.server.requestIdHeader },
      clientIp: { trustedProxies: ctx.config.server.trustedProxies },

      middleware: {
        pre: [corsMiddleware(ctx.config.server.corsOrigins, ctx.config.server.requestIdHeader)],
      },

      routes: (app: Application): void => {
        ctx.registerRoutes(app, ctx.config, ctx.services.domains)
      },

      startHooks,
      stopHooks,
    },
  )

  return {
    app: server.app,
    server,
    startHooks,
    stopHooks,
  }
}
