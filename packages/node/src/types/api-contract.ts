/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

/**
 * Hono environment type for the errmap example service.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Bearer token the request authenticated with (set by auth middleware) */
    token: string | undefined;

    /** Code of the error response, if any (set by the error and not-found handlers) */
    errorCode: string | undefined;
  };
}
