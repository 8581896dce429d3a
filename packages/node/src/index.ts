/**
 * @errmap/node — Hono error boundary for derived error types.
 *
 * Provides:
 * - errorHandler: onError handler rendering DerivedError values
 * - request id and request logging middleware
 * - createApp: the example accounts service
 *
 * @packageDocumentation
 */

export { loadConfig, parseApiTokens, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { ApiError, AuthError, authFailure } from "./errors.js";
export type { ApiErrorValue, AuthErrorValue } from "./errors.js";
export { AccountStore } from "./services/account-store.js";
export type { Account } from "./services/account-store.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
