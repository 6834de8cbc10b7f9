import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Keep only variables starting with this prefix, and strip it. */
  prefix?: string
  /** @default process.env */
  env?: NodeJS.ProcessEnv
}

export class EnvSource implements ConfigSource {
  readonly name = "env"

  constructor(private readonly options: EnvSourceOptions = {}) {}

  async load(): Promise<Record<string, unknown>> {
    const env = this.options.env ?? process.env
    const prefix = this.options.prefix ?? ""

    return Object.fromEntries(
      Object.entries(env)
        .filter(([key]) => key.startsWith(prefix))
        .map(([key, value]) => [key.slice(prefix.length), value]),
    )
  }
}
