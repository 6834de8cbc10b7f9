import * as z from "zod/v4/core"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError, type ConfigIssue } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  /** Any zod schema, classic (`zod`) or `zod/mini`. */
  schema: z.$ZodType<T>
  /** @default [new EnvSource()] */
  sources?: ConfigSource[]
}

/**
 * Merges `sources` in order (later wins, `undefined` never overrides) and
 * validates the result against `schema`.
 *
 * @throws {ConfigError} listing every schema issue
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = z.safeParse(schema, merged)

  if (!result.success) {
    const issues: ConfigIssue[] = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }))

    throw new ConfigError(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      issues,
      result.error,
    )
  }

  for (const key of Object.keys(result.data)) {
    if (!(key in provenance)) {
      provenance[key] = "default"
    }
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)))
}
