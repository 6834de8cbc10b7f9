import { correlation as defaultCorrelation } from "@mailstop/logger"
import { Hono, type Context as HonoContext, type MiddlewareHandler } from "hono"
import { createErrorHandler } from "./errors/create-error-handler"
import { buildApp } from "./lifecycle/build-app"
import { createStopper, type ServerHandle } from "./lifecycle/create-stopper"
import { listen } from "./lifecycle/listen"
import { type StopResult, shutdown } from "./lifecycle/shutdown"
import { type SignalHandler, setupProcessHandlers } from "./lifecycle/signals"
import { type ServerState, startServer } from "./lifecycle/start-server"
import { startup } from "./lifecycle/startup"
import { createDefaultMiddleware } from "./middleware/create-default-middleware"
import { resolveOptions, type ServerDependencies, type ServerOptions } from "./server-options"

export type Application = Hono
export type Context = HonoContext
export type Middleware = MiddlewareHandler

export interface Server {
  /** The built application; usable with `app.request()` without listening. */
  readonly app: Application
  setupProcessHandlers(): this
  start(): Promise<ServerHandle>
}

export interface Closeable {
  close: (callback?: (err?: Error | null) => void) => void
}

export function createApp(): Application {
  return new Hono()
}

const NOTHING_TO_STOP: StopResult = { ok: true, failures: [], timedOut: false }

/**
 * Wires the Hono app and its lifecycle. The app is built on first use,
 * so `server.app` serves in-process requests without a listening socket.
 */
export function createServer(deps: ServerDependencies, options: ServerOptions): Server {
  const resolved = resolveOptions(options)
  const { logger } = deps
  const lifecycleLogger = logger.child({ logger: "http.server" })
  const correlation = deps.correlation ?? defaultCorrelation
  const now = deps.now ?? Date.now

  const runtime: {
    ready: boolean
    state: ServerState
    app?: Application
    running?: ServerHandle
    signals?: SignalHandler
  } = { ready: false, state: "idle" }

  const getApp = (): Application => {
    if (!runtime.app) {
      runtime.app = buildApp({
        options: resolved,
        isReady: () => runtime.ready,
        createErrorHandler: () => createErrorHandler(resolved, logger),
        defaultMiddleware: createDefaultMiddleware(resolved, { logger, correlation }),
      })
    }

    return runtime.app
  }

  const stopRunning = (): Promise<StopResult> => {
    if (runtime.running) return runtime.running.stop()

    lifecycleLogger.warning("Stop called but server not running")

    return Promise.resolve(NOTHING_TO_STOP)
  }

  const server: Server = {
    get app() {
      return getApp()
    },

    setupProcessHandlers() {
      if (!runtime.signals) {
        runtime.signals = setupProcessHandlers({ logger: lifecycleLogger, stop: stopRunning })
      }

      return server
    },

    start: () =>
      startServer({
        collabs: { onStartup: startup, onShutdown: shutdown, listen, createStopper },
        logger: lifecycleLogger,
        now,
        options: resolved,
        getApp,
        getState: () => runtime.state,
        setState: (state) => {
          runtime.state = state
        },
        setReady: (ready) => {
          runtime.ready = ready
        },
        setRunningServer: (running) => {
          runtime.running = running
        },
        getSignalHandler: () => runtime.signals,
      }),
  }

  return server
}
