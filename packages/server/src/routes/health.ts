import type { Application } from "../create-server"
import type { ResolvedHealthConfig } from "../server-options"

const NO_CACHE_HEADERS = {
  "Cache-Control": "no-store, no-cache, must-revalidate",
} as const

/**
 * Liveness and readiness probes. They pass through the request
 * interceptor like any route; the access log skips their paths.
 */
export function registerHealthRoutes(
  app: Application,
  config: ResolvedHealthConfig,
  isReady: () => boolean,
): void {
  if (!config.enabled) return

  app.get(config.livenessPath, (c) => c.json({ ok: true }, { headers: NO_CACHE_HEADERS }))

  app.get(config.readinessPath, (c) => {
    if (!isReady()) {
      return c.json(
        { ok: false, reason: "starting" },
        { status: 503, headers: NO_CACHE_HEADERS },
      )
    }

    return c.json({ ok: true }, { headers: NO_CACHE_HEADERS })
  })
}
