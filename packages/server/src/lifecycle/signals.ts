import type { Logger } from "@mailstop/logger"
import type { StopResult } from "./shutdown"

export interface SignalHandlerContext {
  logger: Logger
  stop?: () => Promise<StopResult>
  /** Upper bound on the stop run after a fatal error. @default 10_000 */
  fatalTimeoutMs?: number
}

export interface SignalHandler {
  unregister: () => void
}

const STOP_SIGNALS = ["SIGINT", "SIGTERM"] as const

/**
 * SIGINT and SIGTERM stop the server once; an uncaught exception or an
 * unhandled rejection is logged at ERROR, runs the stop within
 * `fatalTimeoutMs` and exits with code 1.
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const { logger } = ctx
  const fatalTimeoutMs = ctx.fatalTimeoutMs ?? 10_000
  let stopping = false

  async function stopFor(reason: string): Promise<void> {
    if (!ctx.stop) {
      logger.warning("No stop handler registered", { reason })
      return
    }

    let result: StopResult

    try {
      result = await ctx.stop()
    } catch (err) {
      logger.error("Shutdown failed", { reason, err })
      return
    }

    if (result.ok) return

    logger.error("Shutdown completed with issues", {
      reason,
      failed_hooks: result.failures.map((f) => f.hook),
      timed_out: result.timedOut,
    })
  }

  async function exitAfterStop(reason: string): Promise<void> {
    const forced = setTimeout(() => {
      logger.error("Forced exit after timeout", { timeout_ms: fatalTimeoutMs })
      process.exit(1)
    }, fatalTimeoutMs)

    forced.unref()

    try {
      await stopFor(reason)
    } finally {
      clearTimeout(forced)
    }

    process.exit(1)
  }

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}`, { signal })

    if (stopping) return
    stopping = true

    logger.warning("Shutdown triggered", { reason: signal })
    void stopFor(signal)
  }

  const onFatal = (reason: "uncaughtException" | "unhandledRejection", err: unknown) => {
    if (stopping) {
      logger.error("Fatal error during shutdown", { reason, err })
      process.exit(1)
    } else {
      stopping = true
      logger.error("Fatal error", { reason, err })
      void exitAfterStop(reason)
    }
  }

  const signalListeners = STOP_SIGNALS.map((signal) => [signal, () => onSignal(signal)] as const)
  const onUncaught = (err: Error) => onFatal("uncaughtException", err)
  const onRejection = (reason: unknown) => onFatal("unhandledRejection", reason)

  for (const [signal, listener] of signalListeners) process.on(signal, listener)
  process.on("uncaughtException", onUncaught)
  process.on("unhandledRejection", onRejection)

  return {
    unregister: () => {
      for (const [signal, listener] of signalListeners) process.off(signal, listener)
      process.off("uncaughtException", onUncaught)
      process.off("unhandledRejection", onRejection)
    },
  }
}
