export { BaseError, type BaseErrorOptions, serializeError } from "./core/base-error"
export { isAppError } from "./core/is-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
