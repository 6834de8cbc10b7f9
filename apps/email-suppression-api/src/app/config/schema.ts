import { logDrivers } from "@mailstop/logger"
import { z } from "zod/mini"

export const suppressionProviders = ["oci", "memory"] as const
export type SuppressionProviderKind = (typeof suppressionProviders)[number]

export const ociAuthModes = ["instance_principal", "config_file"] as const
export type OciAuthMode = (typeof ociAuthModes)[number]

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),

  API_TITLE: z._default(z.string(), "Email Suppression Service"),
  API_VERSION: z._default(z.string(), "1.0.0"),
  API_DESCRIPTION: z._default(
    z.string(),
    "Checks and removes addresses on the email delivery suppression list",
  ),

  SERVER_HOST: z._default(z.string(), "0.0.0.0"),
  SERVER_PORT: z._default(z.coerce.number(), 8000),
  SERVER_SHUTDOWN_TIMEOUT_MS: z._default(z.coerce.number(), 10_000),

  // Lenient on purpose: unknown levels fall back to INFO, unknown formats to text.
  LOG_LEVEL: z._default(z.string(), "INFO"),
  LOG_FORMAT: z._default(z.string(), "json"),
  LOG_DRIVER: z._default(z.enum(logDrivers), "pino"),

  REQUEST_ID_HEADER: z._default(z.string(), "x-request-id"),
  CLIENT_IP_TRUSTED_PROXIES: z._default(z.coerce.number(), 0),
  CORS_ORIGINS: z._default(z.string(), "*"),

  SUPPRESSION_PROVIDER: z._default(z.enum(suppressionProviders), "oci"),

  OCI_TENANCY_OCID: z.optional(z.string()),
  OCI_REGION: z._default(z.string(), "ap-mumbai-1"),
  OCI_AUTH: z._default(z.enum(ociAuthModes), "instance_principal"),
  OCI_CONFIG_FILE: z.optional(z.string()),
  OCI_PROFILE: z.optional(z.string()),
})

export type EnvConfig = z.infer<typeof envSchema>

export type OciConfig = {
  tenancyOcid: string
  region: string
  auth: OciAuthMode
  configFile?: string
  profile?: string
}

export type AppConfig = {
  app: {
    env: string
  }

  api: {
    title: string
    version: string
    description: string
  }

  server: {
    host: string
    port: number
    shutdownTimeoutMs: number
    requestIdHeader: string
    trustedProxies: number
    corsOrigins: string[]
  }

  logging: {
    level: string
    format: string
    driver: (typeof logDrivers)[number]
  }

  suppressions: {
    provider: SuppressionProviderKind
    region: string
  }

  /** Present when the provider is `oci`. */
  oci?: OciConfig
}
