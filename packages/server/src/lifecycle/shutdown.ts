import type { Logger } from "@mailstop/logger"
import type { Closeable } from "../create-server"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export type ShutdownContext = {
  server: Closeable
  now: () => number
  logger: Logger
  deadlineMs: number
  stopHooks: LifecycleHook[]
}

export type StopResult = {
  ok: boolean
  failures: HookFailure[]
  /** Some hook was skipped or aborted at the deadline; open sockets are not tracked. */
  timedOut: boolean
}

export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  const { server, stopHooks, ...run } = ctx

  run.logger.warning("Shutting down gracefully")

  const { failures, timedOut } = await runHooks({ phase: "shutdown", ...run }, [
    closeServerHook(server),
    ...stopHooks,
  ])

  run.logger.info("Shutdown complete")

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

export type ShutdownFn = typeof shutdown

/** Resolves once the server has closed, or as soon as the hook's budget runs out. */
function closeServerHook(server: Closeable): LifecycleHook {
  return {
    name: "server.close",
    fn: ({ signal }) =>
      new Promise<void>((resolve, reject) => {
        if (signal.aborted) {
          resolve()
          return
        }

        const onAbort = () => resolve()

        signal.addEventListener("abort", onAbort, { once: true })

        server.close((err) => {
          signal.removeEventListener("abort", onAbort)

          if (err) reject(err)
          else resolve()
        })
      }),
  }
}
