import type { Application } from "@mailstop/server"
import { createApp } from "@mailstop/server"
import { createSuppressionsModule } from "../domains/suppressions/api"
import type { AppConfig } from "./config"
import type { DomainServices } from "./services"

export type ApiModule = {
  name: string
  register: (app: Application) => void
}

export const SUPPRESSION_ROUTES = {
  check: "GET /api/v1/email-suppression/{email}",
  remove: "DELETE /api/v1/email-suppression/{email}",
} as const

export function registerRoutes(
  app: Application,
  config: AppConfig,
  services: DomainServices,
): void {
  const apiV1Router = createApp()

  const modules: ApiModule[] = [createSuppressionsModule({ suppressions: services.suppressions })]

  for (const m of modules) {
    m.register(apiV1Router)
  }

  app.route("/api/v1", apiV1Router)

  app.get("/", (c) =>
    c.json({
      status: "healthy",
      service: config.api.title,
      version: config.api.version,
      docs: null,
    }),
  )

  app.get("/health", (c) =>
    c.json({
      status: "ok",
      service: config.api.title,
      version: config.api.version,
      region: config.suppressions.region,
      endpoints: {
        health: "/health",
        liveness: "/health/live",
        readiness: "/health/ready",
        email_suppression: SUPPRESSION_ROUTES,
      },
    }),
  )
}

export type RegisterRoutesFn = typeof registerRoutes
