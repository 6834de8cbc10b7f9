export * from "./adapters/console/console-logger"
export * from "./adapters/null/null-logger"
export * from "./adapters/pino/pino-logger"
export * from "./core/correlation/correlation-context"
export * from "./core/format/build-record"
export * from "./core/format/format-record"
export * from "./core/format/sanitize-fields"
export * from "./core/levels"
export * from "./core/logging"
export type * from "./ports/correlation"
export type * from "./ports/line-writer"
export * from "./ports/log-level"
export type * from "./ports/log-meta"
export * from "./ports/log-record"
export type * from "./ports/logger"
export * from "./ports/logger-options"
