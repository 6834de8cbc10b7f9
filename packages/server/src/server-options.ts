import type { CorrelationStore, Logger, LogLevelName } from "@mailstop/logger"
import { generateCorrelationId } from "@mailstop/logger"
import { type Application, createApp, type Middleware } from "./create-server"
import type { ErrorHandler } from "./errors/create-error-handler"
import type { ErrorMappingsConfig } from "./errors/errors"
import type { LifecycleHook } from "./lifecycle/lifecycle-hook"

export type PathString = `/${string}`

/** A feature that is on unless `enabled: false` is passed. */
type Toggle<T> = { enabled: false } | ({ enabled: true } & T)

type ResolvedToggle<T> = { enabled: false } | ({ enabled: true } & Required<T>)

export interface ServerDependencies {
  logger: Logger

  /** @default the process-wide store from `@mailstop/logger` */
  correlation?: CorrelationStore

  /** Epoch milliseconds for lifecycle deadlines. @default Date.now */
  now?: () => number
}

export interface RequestIdConfig {
  /** Response header echoing the id. @default "x-request-id" */
  header?: string

  /** Incoming ids are never reused. @default 8 lowercase hex characters */
  generate?: () => string
}

export interface AccessLogConfig {
  /** Level of 1xx-4xx lines; 5xx always logs at `error`. @default "info" */
  level?: LogLevelName

  /** @default the health probe paths */
  ignorePaths?: PathString[]
}

export interface HealthPaths {
  /** @default "/health/live" */
  livenessPath?: PathString

  /** @default "/health/ready" */
  readinessPath?: PathString
}

export type EnabledRequestLoggingConfig = { enabled: true } & AccessLogConfig

export type ErrorHandling =
  | { kind: "handler"; errorHandler: ErrorHandler }
  | { kind: "mappings"; config: ErrorMappingsConfig }

export interface ServerOptions {
  port: number

  /** @default "0.0.0.0" */
  host?: string

  /** Budget for start hooks. @default no limit */
  startupTimeoutMs?: number

  /** Budget for graceful shutdown. @default 10_000 */
  shutdownTimeoutMs?: number

  requestId?: RequestIdConfig
  requestLogging?: Toggle<AccessLogConfig>
  health?: Toggle<HealthPaths>

  /**
   * Number of proxies at the end of X-Forwarded-For to trust. For
   * "client, proxy1, proxy2" and 1 trusted proxy the client is "proxy1".
   * Unset means the socket address is used.
   */
  clientIp?: { trustedProxies?: number }

  errorHandling: ErrorHandling

  createApp?: () => Application

  routes: (app: Application) => void

  middleware?: { pre?: Middleware[]; post?: Middleware[] }

  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

export type ResolvedRequestIdConfig = Required<RequestIdConfig>
export type ResolvedHealthConfig = ResolvedToggle<HealthPaths>

export type ResolvedServerOptions = Required<
  Omit<ServerOptions, "requestId" | "requestLogging" | "health" | "clientIp" | "middleware">
> & {
  requestId: ResolvedRequestIdConfig
  requestLogging: ResolvedToggle<AccessLogConfig>
  health: ResolvedHealthConfig
  clientIp: { trustedProxies?: number }
  middleware: { pre: Middleware[]; post: Middleware[] }
}

// 2^31 - 1, the longest delay a Node timer accepts
const NO_STARTUP_LIMIT_MS = 2_147_483_647

const DEFAULT_HEALTH_PATHS: Required<HealthPaths> = {
  livenessPath: "/health/live",
  readinessPath: "/health/ready",
}

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  const health: ResolvedHealthConfig =
    options.health?.enabled === false
      ? { enabled: false }
      : { ...DEFAULT_HEALTH_PATHS, ...options.health, enabled: true }

  const requestLogging: ResolvedToggle<AccessLogConfig> =
    options.requestLogging?.enabled === false
      ? { enabled: false }
      : {
          enabled: true,
          level: options.requestLogging?.level ?? "info",
          ignorePaths:
            options.requestLogging?.ignorePaths ??
            (health.enabled ? [health.livenessPath, health.readinessPath] : []),
        }

  const trusted = options.clientIp?.trustedProxies

  return {
    port: options.port,
    host: options.host ?? "0.0.0.0",
    startupTimeoutMs: options.startupTimeoutMs ?? NO_STARTUP_LIMIT_MS,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? 10_000,
    requestId: {
      header: options.requestId?.header ?? "x-request-id",
      generate: options.requestId?.generate ?? generateCorrelationId,
    },
    requestLogging,
    health,
    clientIp: typeof trusted === "number" ? { trustedProxies: Math.max(0, Math.floor(trusted)) } : {},
    errorHandling: options.errorHandling,
    routes: options.routes,
    createApp: options.createApp ?? createApp,
    middleware: {
      pre: options.middleware?.pre ?? [],
      post: options.middleware?.post ?? [],
    },
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}
