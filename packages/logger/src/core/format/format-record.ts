import type { LogRecord } from "../../ports/log-record"
import type { LogFormat } from "../../ports/logger-options"
import { LEVEL_LABELS } from "../levels"
import { sanitizeFields } from "./sanitize-fields"

export function formatRecord(record: LogRecord, format: LogFormat): string {
  return format === "json" ? formatJsonRecord(record) : formatTextRecord(record)
}

/**
 * One JSON object per record: `timestamp`, `level`, `logger`, `message`,
 * then `request_id` (only when set), extras at the top level and
 * `exception` (only when the record carries an error).
 */
export function formatJsonRecord(record: LogRecord): string {
  const payload: Record<string, unknown> = {
    timestamp: isoTimestamp(record.timestamp),
    level: LEVEL_LABELS[record.level],
    logger: record.logger,
    message: record.message,
    ...(record.requestId !== undefined && { request_id: record.requestId }),
    ...sanitizeFields(record.fields),
    ...(record.exception !== undefined && { exception: record.exception }),
  }

  return stringifyPayload(payload)
}

/**
 * `YYYY-mm-dd HH:MM:SS - <logger> - <LEVEL> - <message>` (UTC).
 * Correlation id and extras are not part of text lines; an exception
 * follows on indented lines.
 */
export function formatTextRecord(record: LogRecord): string {
  const line = `${textTimestamp(record.timestamp)} - ${record.logger} - ${LEVEL_LABELS[record.level]} - ${record.message}`

  if (record.exception === undefined || record.exception.length === 0) return line

  const indented = record.exception
    .split("\n")
    .map((l) => `  ${l}`)
    .join("\n")

  return `${line}\n${indented}`
}

function validDate(date: Date): Date {
  return Number.isFinite(date.valueOf()) ? date : new Date()
}

function isoTimestamp(date: Date): string {
  return validDate(date).toISOString()
}

function textTimestamp(date: Date): string {
  return isoTimestamp(date).slice(0, 19).replace("T", " ")
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") return value.toString()
  if (value instanceof Error) return { name: value.name, message: value.message }

  return value
}

function stringifyPayload(payload: Record<string, unknown>): string {
  try {
    return JSON.stringify(payload, jsonReplacer)
  } catch {
    return JSON.stringify(Object.fromEntries(Object.entries(payload).map(toSafeEntry)), jsonReplacer)
  }
}

function toSafeEntry([key, value]: [string, unknown]): [string, unknown] {
  try {
    JSON.stringify(value, jsonReplacer)
    return [key, value]
  } catch {
    return [key, safeString(value)]
  }
}

function safeString(value: unknown): string {
  try {
    return String(value)
  } catch {
    return "[unserializable]"
  }
}
