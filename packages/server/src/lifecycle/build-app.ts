import type { Application, Middleware } from "../create-server"
import type { ErrorHandler } from "../errors/create-error-handler"
import { registerHealthRoutes } from "../routes/health"
import type { ResolvedServerOptions } from "../server-options"

export interface BuildAppContext {
  isReady: () => boolean
  createErrorHandler: () => ErrorHandler
  options: ResolvedServerOptions
  defaultMiddleware: Middleware[]
}

/**
 * Default middleware first, then health routes, `pre` middleware, the
 * application's routes and `post` middleware.
 */
export function buildApp(ctx: BuildAppContext): Application {
  const { options, isReady } = ctx

  const app = options.createApp()

  applyMiddleware(app, ctx.defaultMiddleware)

  registerHealthRoutes(app, options.health, isReady)

  applyMiddleware(app, options.middleware.pre)
  options.routes(app)
  applyMiddleware(app, options.middleware.post)

  app.onError(ctx.createErrorHandler())

  return app
}

function applyMiddleware(app: Application, middleware: Middleware[]): void {
  for (const mw of middleware) app.use("*", mw)
}
