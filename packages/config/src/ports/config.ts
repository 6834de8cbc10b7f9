/**
 * Validated configuration plus where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({ schema, sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()] })
 * config.value.SERVER_PORT      // 8000
 * config.explain("OCI_REGION")  // "dotenv:.env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /** Name of the source that supplied `key`, or `"default"` when the schema did. */
  explain<K extends keyof T & string>(key: K): string

  /** Sources that supplied at least one value, in load order. */
  sourcesUsed(): string[]

  /** Keys some source provided that the schema does not know, typos included. */
  unknownKeys(): string[]
}
