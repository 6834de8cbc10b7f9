export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> | T[P] : T[P]
}

/**
 * Applies structural overrides to an object tree.
 *
 * Semantics:
 * - Plain objects (object literals) are deep-merged.
 * - Everything else (class instances, arrays, Dates, functions, etc.)
 *   is treated as atomic and replaced.
 * - `undefined` in overrides leaves the base value in place.
 */
export function applyOverrides<T extends object>(base: T, overrides: DeepPartial<T> = {}): T {
  return deepMerge(base, overrides)
}

function deepMerge<T extends object>(base: T, overrides: DeepPartial<T>): T {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(base))

  for (const [key, overrideVal] of Object.entries(overrides)) {
    if (overrideVal === undefined) continue

    const baseVal = result[key]

    result[key] =
      isPlainObject(baseVal) && isPlainObject(overrideVal)
        ? deepMerge(baseVal, overrideVal)
        : overrideVal
  }

  // Keys and value types come from T; only their values changed.
  return result as T
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false
  if (Array.isArray(value)) return false

  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
