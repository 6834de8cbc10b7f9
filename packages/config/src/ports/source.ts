/**
 * Raw key/value input to the config loader. Sources neither validate nor
 * coerce; the loader merges them in order, later ones winning, and hands
 * the result to the schema. A key mapped to `undefined` counts as unset.
 */
export interface ConfigSource {
  /** Shown in load errors, e.g. `env` or `dotenv:.env.production`. */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
