export type CorrelationReader = {
  /** Correlation id of the current async flow, if one is set. */
  get(): string | undefined
}

/**
 * Ambient, per-async-flow holder of the current request's correlation id.
 */
export interface CorrelationStore extends CorrelationReader {
  /** Runs `fn` in a fresh, empty scope isolated from concurrent flows. */
  run<T>(fn: () => T): T
  set(id: string): void
  clear(): void
}
