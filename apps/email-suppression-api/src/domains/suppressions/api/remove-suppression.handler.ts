import type { Context } from "hono"
import type { BlankEnv } from "hono/types"
import type { RemoveSuppressionResult } from "../model/suppression.model"
import type { SuppressionService } from "../services/suppression-service"

export function removeSuppressionHandler(service: SuppressionService) {
  return async (c: Context<BlankEnv, "/:email">) => {
    const result = await service.remove(c.req.param("email"))

    return c.json<RemoveSuppressionResult>(result)
  }
}
