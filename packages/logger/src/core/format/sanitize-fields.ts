import { RESERVED_RECORD_KEYS } from "../../ports/log-record"
import type { LogFields } from "../../ports/log-meta"

const RESERVED = new Set<string>(RESERVED_RECORD_KEYS)

/**
 * Drops undefined values, the `err` carrier and keys owned by the record.
 */
export function sanitizeFields(fields: LogFields): LogFields {
  const out: LogFields = {}

  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined || key === "err" || RESERVED.has(key)) continue
    out[key] = value
  }

  return out
}
