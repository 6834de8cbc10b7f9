export { loadAppConfig, mapEnvToConfig } from "./load-app-config"
export * from "./schema"
