import type { LifecycleHook } from "@mailstop/server"
import type { AppContext } from "../create-context"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  return [
    {
      name: "stop:banner",
      fn: async () => {
        context.services.core.logger.info("Application shutting down", {
          service: context.config.api.title,
        })
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
