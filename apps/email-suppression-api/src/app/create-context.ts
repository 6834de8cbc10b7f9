import path from "node:path"
import { fileURLToPath } from "node:url"
import { applyOverrides, type DeepPartial } from "@mailstop/server"
import { type AppConfig, loadAppConfig } from "./config"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type RegisterRoutesFn, registerRoutes } from "./routes"
import { type AppServices, createDefaultDomainServices, type DomainServices } from "./services"
import { type CoreServices, createCoreServices } from "./services/core"
import { createDefaultInfraClients, type InfraClients } from "./services/infra"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  configOverrides?: DeepPartial<AppConfig>
  infraOverrides?: Partial<InfraClients>
  coreOverrides?: Partial<CoreServices>
  domainOverrides?: DeepPartial<DomainServices>
}

export type AppContext = {
  config: AppConfig
  infra: InfraClients
  services: AppServices
  registerRoutes: RegisterRoutesFn
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..")

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const config = await loadAppConfig(
    options.env ?? process.env,
    options.configOverrides,
    projectRoot,
  )

  const core = options.coreOverrides?.logger
    ? { logger: options.coreOverrides.logger }
    : createCoreServices(config)

  const infra = options.infraOverrides?.suppressionProvider
    ? { suppressionProvider: options.infraOverrides.suppressionProvider }
    : await createDefaultInfraClients(config)

  const baseDomains = createDefaultDomainServices(config, infra, core)
  const domains = applyOverrides(baseDomains, options.domainOverrides)

  return {
    config,
    infra,
    services: { core, domains },
    registerRoutes,
    createStartHooks,
    createStopHooks,
  }
}
