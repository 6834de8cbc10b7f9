import type { Logger } from "@mailstop/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export type RunHooksContext = {
  phase: HookPhase
  /** Epoch milliseconds. */
  now: () => number
  logger: Logger
  /** Epoch milliseconds after which remaining hooks are skipped. */
  deadlineMs: number
}

export type RunHooksPolicy = {
  /** Stop after the first failure, as startup does. */
  failFast?: boolean
}

export type RunHooksResult = { failures: HookFailure[]; timedOut: boolean }

const PHASE_LABEL: Record<HookPhase, string> = { startup: "Startup", shutdown: "Shutdown" }

/**
 * Runs hooks one after another against a shared deadline. Each hook gets
 * the time left and a signal aborted when that time runs out; hooks not
 * yet started when the deadline passes are skipped.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<RunHooksResult> {
  const { logger, phase } = ctx
  const label = PHASE_LABEL[phase]
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const timeRemainingMs = Math.max(0, ctx.deadlineMs - ctx.now())

    if (timeRemainingMs === 0) {
      logger.warning(`Skipping remaining ${phase} hooks due to timeout`)
      return { failures, timedOut: true }
    }

    const budget = new AbortController()
    const timer = setTimeout(() => budget.abort(), timeRemainingMs)
    let failed = false

    try {
      await hook.fn({ signal: budget.signal, timeRemainingMs })
    } catch (error) {
      failed = true
      failures.push({ hook: hook.name, error })
      logger.error(`${label} hook failed: ${hook.name}`, { err: error })
    } finally {
      clearTimeout(timer)
    }

    const timedOut = budget.signal.aborted || ctx.now() >= ctx.deadlineMs

    if (timedOut) {
      logger.warning(`${label} deadline exceeded during hook: ${hook.name}`)
      return { failures, timedOut }
    }

    if (failed && policy.failFast) return { failures, timedOut }
    if (!failed) logger.info(`Executed ${phase} hook: ${hook.name}`)
  }

  return { failures, timedOut: false }
}
