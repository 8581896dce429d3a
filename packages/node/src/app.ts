/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { ResponseRenderer } from "@errmap/context";
import type { AppEnv } from "./types/api-contract.js";
import { ApiError, AuthError } from "./errors.js";
import { AccountStore } from "./services/account-store.js";
import { errorHandler } from "./middleware/error-handler.js";
import type { ErrorLogEntry } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import type { RequestIdOptions } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createCatalogRoute } from "./routes/catalog.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  readonly errorLogFn?: ((entry: ErrorLogEntry) => void) | undefined;
  /** Auth configuration. When provided, /api/* requires a bearer token. */
  readonly auth?: AuthConfig | undefined;
  /** Use thrown messages for unexpected errors. Default: false */
  readonly exposeInternalErrors?: boolean | undefined;
  /** Renderer for unexpected errors. Default: the JSON envelope */
  readonly fallback?: ResponseRenderer | undefined;
  readonly requestId?: RequestIdOptions | undefined;
  readonly store?: AccountStore | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly store: AccountStore;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const store = options.store ?? new AccountStore();
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware(options.requestId));

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(
    errorHandler({
      logFn: options.errorLogFn,
      exposeInternalErrors: options.exposeInternalErrors,
      fallback: options.fallback,
    }),
  );

  app.notFound((c) => {
    const err = ApiError.create({
      variant: "RouteNotFound",
      payload: `${c.req.method} ${c.req.path}`,
    });
    c.set("errorCode", err.toResponseContext().code);
    return err.toResponse();
  });

  // ─── Public Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes());
  app.route("/", createCatalogRoute([ApiError, AuthError]));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  }

  app.route("/api/v1/accounts", createAccountRoutes(store));

  return { app, store };
}
