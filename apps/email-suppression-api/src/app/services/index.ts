import {
  createSuppressionServices,
  type SuppressionServices,
} from "../../domains/suppressions/composition"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { InfraClients } from "./infra"

export type DomainServices = {
  suppressions: SuppressionServices
}

export type AppServices = {
  core: CoreServices
  domains: DomainServices
}

export function createDefaultDomainServices(
  _config: AppConfig,
  infra: InfraClients,
  core: CoreServices,
): DomainServices {
  return {
    suppressions: createSuppressionServices({
      provider: infra.suppressionProvider,
      logger: core.logger,
    }),
  }
}
