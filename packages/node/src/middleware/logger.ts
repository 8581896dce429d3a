/**
 * Structured logging middleware.
 *
 * Reports one entry per request to a log function; main.ts hands it
 * to pino. Error responses carry the code the error handler resolved,
 * so a request line can be matched to its error type without parsing
 * the body.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Error code of the response; undefined on success and on HTTPException. */
  readonly errorCode: string | undefined;
}

/**
 * Creates a request logging middleware.
 *
 * Logs once the response is ready, including responses produced by the
 * error and not-found handlers.
 */
export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      errorCode: c.get("errorCode"),
    };

    log(entry);
  };
}
