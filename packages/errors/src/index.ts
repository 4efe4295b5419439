export { BaseError, type BaseErrorOptions, serializeError } from "./core/base-error"
export { errorChain, findInChain } from "./core/utils/error-chain"
export { isAppError } from "./core/utils/is-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
