import type { Logger } from "@mailstop/logger"
import type { Application } from "../create-server"
import type { ResolvedServerOptions } from "../server-options"
import type { CreateStopperFn, ServerHandle } from "./create-stopper"
import type { ListenFn } from "./listen"
import type { ShutdownFn } from "./shutdown"
import type { SignalHandler } from "./signals"
import type { StartupFn } from "./startup"

export type ServerState = "idle" | "starting" | "started"

export interface StartServerCollabs {
  onStartup: StartupFn
  onShutdown: ShutdownFn

  listen: ListenFn
  createStopper: CreateStopperFn
}

export type StartServerContext = {
  logger: Logger
  now: () => number
  options: ResolvedServerOptions

  /** Builds (or returns the already built) application. */
  getApp(): Application

  getState(): ServerState
  setState(state: ServerState): void

  setReady(value: boolean): void

  setRunningServer(server: ServerHandle): void
  getSignalHandler(): SignalHandler | undefined

  collabs: StartServerCollabs
}

export class StartupError extends Error {
  constructor(
    message: string,
    readonly failures: readonly { hook: string; error: unknown }[],
    readonly timedOut: boolean,
  ) {
    super(message, { cause: failures[0]?.error })
    this.name = "StartupError"
  }
}

export async function startServer(ctx: StartServerContext): Promise<ServerHandle> {
  if (ctx.getState() !== "idle") throw new Error("Server already started")

  ctx.setState("starting")

  try {
    const started = await ctx.collabs.onStartup({
      now: ctx.now,
      logger: ctx.logger,
      deadlineMs: ctx.now() + ctx.options.startupTimeoutMs,
      startHooks: ctx.options.startHooks,
    })

    if (!started.ok) {
      throw new StartupError(
        started.timedOut ? "Startup timed out" : "Startup hooks failed",
        started.failures,
        started.timedOut,
      )
    }

    const server = ctx.collabs.listen(ctx.getApp(), ctx.options, ctx.logger)

    const running = ctx.collabs.createStopper({
      logger: ctx.logger,
      now: ctx.now,
      server,
      options: ctx.options,
      stopHooks: ctx.options.stopHooks,
      setReady: ctx.setReady,
      shutdown: ctx.collabs.onShutdown,
      onStop: () => ctx.getSignalHandler()?.unregister(),
    })

    ctx.setRunningServer(running)
    ctx.setReady(true)
    ctx.setState("started")

    return running
  } catch (err) {
    ctx.setState("idle")
    ctx.setReady(false)
    throw err
  }
}
