import { errorChain } from "./error-chain"

export const CAUSE_SEPARATOR = "\nCaused by: "

/**
 * Render a thrown value as multi-line text: the stack of the error followed
 * by one `Caused by:` section per link of its cause chain.
 *
 * @example
 * ```ts
 * describeError(new Error("outer", { cause: "disk full" }))
 * // "Error: outer\n    at ...\nCaused by: disk full"
 * ```
 */
export function describeError(err: unknown, maxDepth: number = 10): string {
  return errorChain(err, maxDepth).map(describeOne).join(CAUSE_SEPARATOR)
}

function describeOne(value: unknown): string {
  if (value instanceof Error) {
    return value.stack ?? `${value.name}: ${value.message}`
  }

  if (typeof value === "string") return value

  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}
