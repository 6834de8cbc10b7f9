export interface LifecycleHookContext {
  signal: AbortSignal
  timeRemainingMs: number
}

export interface LifecycleHook {
  name: string
  fn: (ctx: LifecycleHookContext) => Promise<void>
}

export interface HookFailure {
  hook: string
  error: unknown
}
