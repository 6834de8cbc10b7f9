import type { Logger } from "@mailstop/logger"
import type { Closeable } from "../create-server"
import type { ResolvedServerOptions } from "../server-options"
import type { LifecycleHook } from "./lifecycle-hook"
import type { ShutdownFn, StopResult } from "./shutdown"

export interface ServerHandle {
  stop(): Promise<StopResult>
  address: { host: string; port: number }
}

export interface RunningServerContext {
  server: Closeable
  logger: Logger
  now: () => number
  options: ResolvedServerOptions
  stopHooks: LifecycleHook[]
  shutdown: ShutdownFn
  setReady: (value: boolean) => void
  /** Runs once the shutdown settles, whatever its result. */
  onStop: () => void
}

/** Every `stop()` call shares the first call's shutdown. */
export function createStopper(ctx: RunningServerContext): ServerHandle {
  const { server, logger, now, options, stopHooks } = ctx
  let stopped: Promise<StopResult> | undefined

  const stopOnce = async (): Promise<StopResult> => {
    ctx.setReady(false)

    try {
      return await ctx.shutdown({
        server,
        logger,
        now,
        stopHooks,
        deadlineMs: now() + options.shutdownTimeoutMs,
      })
    } finally {
      ctx.onStop()
    }
  }

  return {
    stop: () => {
      if (!stopped) stopped = stopOnce()

      return stopped
    },
    address: { host: options.host, port: options.port },
  }
}

export type CreateStopperFn = typeof createStopper
