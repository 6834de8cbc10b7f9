/**
 * The error followed by each `cause` it links to, outermost first.
 * Ends at a missing cause, at the first object seen twice, or after
 * `maxDepth` entries.
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const visited = new Set<unknown>()

  for (let link = err; link != null && chain.length < maxDepth; link = causeOf(link)) {
    if (visited.has(link)) break
    if (typeof link === "object") visited.add(link)

    chain.push(link)
  }

  return chain
}

function causeOf(value: unknown): unknown {
  if (typeof value !== "object" || value === null || !("cause" in value)) return undefined

  return value.cause
}
