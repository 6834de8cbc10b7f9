import { AsyncLocalStorage } from "node:async_hooks"
import { randomUUID } from "node:crypto"
import type { CorrelationStore } from "../../ports/correlation"

type CorrelationState = Readonly<{ correlationId?: string }>

/**
 * AsyncLocalStorage-backed correlation store.
 *
 * `set` and `clear` replace the state of the calling async flow instead of
 * mutating it, so a value set in one request is never observed by another
 * one that interleaves with it.
 */
export class CorrelationContext implements CorrelationStore {
  private readonly storage = new AsyncLocalStorage<CorrelationState>()

  run<T>(fn: () => T): T {
    return this.storage.run({}, fn)
  }

  set(id: string): void {
    this.storage.enterWith({ correlationId: id })
  }

  get(): string | undefined {
    return this.storage.getStore()?.correlationId
  }

  clear(): void {
    if (this.storage.getStore() === undefined) return

    this.storage.enterWith({})
  }
}

/** Process-wide store read by every logger adapter by default. */
export const correlation = new CorrelationContext()

export function currentCorrelationId(): string | undefined {
  return correlation.get()
}

/** Short request id: 8 lowercase hex characters. */
export function generateCorrelationId(): string {
  return randomUUID().slice(0, 8)
}
