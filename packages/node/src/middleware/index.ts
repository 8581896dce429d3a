/**
 * Middleware barrel — re-exports all middleware.
 */

export { errorHandler, INTERNAL_ERROR_CODE, INTERNAL_ERROR_MESSAGE } from "./error-handler.js";
export type { ErrorHandlerOptions, ErrorLogEntry } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export type { RequestIdOptions } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { authMiddleware } from "./auth.js";
export type { AuthConfig } from "./auth.js";
export { parseBody, formatZodError } from "./validate.js";
