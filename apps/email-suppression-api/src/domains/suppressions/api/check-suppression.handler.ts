import type { Context } from "hono"
import type { BlankEnv } from "hono/types"
import type { CheckSuppressionResult } from "../model/suppression.model"
import type { SuppressionService } from "../services/suppression-service"

export function checkSuppressionHandler(service: SuppressionService) {
  return async (c: Context<BlankEnv, "/:email">) => {
    const result = await service.check(c.req.param("email"))

    return c.json<CheckSuppressionResult>(result)
  }
}
