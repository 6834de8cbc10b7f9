import { serve } from "@hono/node-server"
import type { Logger } from "@mailstop/logger"
import type { Application, Closeable } from "../create-server"
import type { ResolvedServerOptions } from "../server-options"

/** Binds the app to the configured host and port. */
export function listen(app: Application, options: ResolvedServerOptions, logger: Logger): Closeable {
  const { host: hostname, port } = options
  const server = serve({ fetch: app.fetch, hostname, port })

  logger.info(`Server listening on http://${hostname}:${port}`, { host: hostname, port })

  return server
}

export type ListenFn = typeof listen
