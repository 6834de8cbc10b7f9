export {
  type Application,
  type Closeable,
  type Context,
  createApp,
  createServer,
  type Middleware,
  type Server,
} from "./create-server"
export { createErrorHandler, type ErrorHandler, REQUEST_LOGGER_NAME } from "./errors/create-error-handler"
export {
  createErrorFormatter,
  type ErrorMapping,
  type ErrorMappingsConfig,
  type ErrorResponse,
  type ErrorResponseBody,
} from "./errors/errors"
export type { ServerHandle } from "./lifecycle/create-stopper"
export type { HookFailure, LifecycleHook, LifecycleHookContext } from "./lifecycle/lifecycle-hook"
export type { StopResult } from "./lifecycle/shutdown"
export { StartupError } from "./lifecycle/start-server"
export { type InterceptedRequest, type InterceptorDeps, interceptRequest } from "./middleware/intercept-request"
export { ACCESS_LOGGER_NAME } from "./middleware/request-logging"
export type { ServerContextVariables } from "./types/context"
export type { PathString, ServerDependencies, ServerOptions } from "./server-options"
export { applyOverrides, type DeepPartial } from "./utils/apply-overrides"
