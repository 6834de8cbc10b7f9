import { type ConfigSource, ConfigError, DotenvSource, EnvSource, loadConfig } from "@mailstop/config"
import { applyOverrides, type DeepPartial } from "@mailstop/server"
import { type AppConfig, type EnvConfig, envSchema, type OciConfig } from "./schema"

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
}

function mapOciConfig(env: EnvConfig): OciConfig | undefined {
  if (env.OCI_TENANCY_OCID === undefined) return undefined

  return {
    tenancyOcid: env.OCI_TENANCY_OCID,
    region: env.OCI_REGION,
    auth: env.OCI_AUTH,
    ...(env.OCI_CONFIG_FILE !== undefined && { configFile: env.OCI_CONFIG_FILE }),
    ...(env.OCI_PROFILE !== undefined && { profile: env.OCI_PROFILE }),
  }
}

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  const oci = mapOciConfig(env)

  return {
    app: {
      env: env.APP_ENV,
    },
    api: {
      title: env.API_TITLE,
      version: env.API_VERSION,
      description: env.API_DESCRIPTION,
    },
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT,
      shutdownTimeoutMs: env.SERVER_SHUTDOWN_TIMEOUT_MS,
      requestIdHeader: env.REQUEST_ID_HEADER,
      trustedProxies: env.CLIENT_IP_TRUSTED_PROXIES,
      corsOrigins: splitList(env.CORS_ORIGINS),
    },
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      driver: env.LOG_DRIVER,
    },
    suppressions: {
      provider: env.SUPPRESSION_PROVIDER,
      region: env.OCI_REGION,
    },
    ...(oci && { oci }),
  }
}

function assertProviderConfig(config: AppConfig): void {
  if (config.suppressions.provider !== "oci" || config.oci) return

  const issue = {
    path: "OCI_TENANCY_OCID",
    message: "Required when SUPPRESSION_PROVIDER is oci",
  }

  throw new ConfigError(`Configuration validation failed:\n✖ ${issue.message}\n  → at ${issue.path}`, [
    issue,
  ])
}

/**
 * Loads `.env`, then `.env.<NODE_ENV>`, then the process environment (later wins).
 *
 * @throws {ConfigError} when a value fails validation
 */
export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  overrides?: DeepPartial<AppConfig>,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const nodeEnv = env.NODE_ENV ?? "development"

  const sources: ConfigSource[] = [
    new DotenvSource({ file: ".env", required: false, cwd }),
    new DotenvSource({ file: `.env.${nodeEnv}`, required: false, cwd }),
    new EnvSource({ env }),
  ]

  const result = await loadConfig({ schema: envSchema, sources })

  const config = mapEnvToConfig(result.value)
  const merged = overrides ? applyOverrides(config, overrides) : config

  assertProviderConfig(merged)

  return merged
}
