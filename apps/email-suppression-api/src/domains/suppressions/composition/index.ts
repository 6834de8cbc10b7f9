import type { Logger } from "@mailstop/logger"
import type { SuppressionProvider } from "../model/suppression.model"
import { SuppressionService } from "../services/suppression-service"

export type SuppressionServices = {
  provider: SuppressionProvider
  service: SuppressionService
}

export function createSuppressionServices(deps: {
  provider: SuppressionProvider
  logger: Logger
}): SuppressionServices {
  return {
    provider: deps.provider,
    service: new SuppressionService(deps),
  }
}
