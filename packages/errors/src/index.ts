export { BaseError, type BaseErrorOptions, type SerializeOptions, serializeError } from "./core/base-error"
export { CAUSE_SEPARATOR, describeError } from "./core/utils/describe-error"
export { errorChain } from "./core/utils/error-chain"
export { isAppError, isOperationalError } from "./core/utils/is-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
