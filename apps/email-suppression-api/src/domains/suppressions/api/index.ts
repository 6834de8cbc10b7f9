import { type Application, createApp } from "@mailstop/server"
import type { SuppressionServices } from "../composition"
import { checkSuppressionHandler } from "./check-suppression.handler"
import { removeSuppressionHandler } from "./remove-suppression.handler"

type SuppressionsModuleDeps = {
  suppressions: SuppressionServices
}

export function createSuppressionsModule(deps: SuppressionsModuleDeps) {
  return {
    name: "email-suppression",
    register: (api: Application) => {
      const suppressions = createApp()

      suppressions.get("/:email", checkSuppressionHandler(deps.suppressions.service))
      suppressions.delete("/:email", removeSuppressionHandler(deps.suppressions.service))

      api.route("/email-suppression", suppressions)
    },
  }
}
