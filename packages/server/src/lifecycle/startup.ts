import type { Logger } from "@mailstop/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export type StartupContext = {
  now: () => number
  logger: Logger
  deadlineMs: number
  startHooks: LifecycleHook[]
}

export type StartResult = { ok: boolean; failures: HookFailure[]; timedOut: boolean }

/** Start hooks run in order; the first failure ends the startup. */
export async function startup(ctx: StartupContext): Promise<StartResult> {
  const { startHooks, ...run } = ctx

  run.logger.debug("Running startup hooks")

  const result = await runHooks({ phase: "startup", ...run }, startHooks, { failFast: true })

  return { ok: result.failures.length === 0 && !result.timedOut, ...result }
}

export type StartupFn = typeof startup
