/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and turns them into
 * responses:
 *
 * - DerivedError → its error type's response (rules fixed at derivation)
 * - HTTPException → the exception's own response
 * - anything else → 500 INTERNAL_ERROR in the standard envelope
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { ResponseContext, renderResponse } from "@errmap/context";
import type { ResponseRenderer } from "@errmap/context";
import { isDerivedError } from "@errmap/derive";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Options
// =============================================================================

export const INTERNAL_ERROR_CODE = "INTERNAL_ERROR";
export const INTERNAL_ERROR_MESSAGE = "Internal server error";

export interface ErrorLogEntry {
  readonly requestId: string;
  readonly status: number;
  readonly code: string | undefined;
  /** True when the error was a value of a derived error type. */
  readonly derived: boolean;
  readonly errorName: string;
  readonly message: string;
}

export interface ErrorHandlerOptions {
  readonly logFn?: ((entry: ErrorLogEntry) => void) | undefined;
  /** Use the thrown error's message for unexpected errors. Default: false */
  readonly exposeInternalErrors?: boolean | undefined;
  /** Renders the fallback context for unexpected errors. */
  readonly fallback?: ResponseRenderer | undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Create the global error handler. Registered as Hono's onError handler.
 */
export function errorHandler(
  options: ErrorHandlerOptions = {},
): (err: Error, c: Context<AppEnv>) => Response {
  const render = options.fallback ?? renderResponse;

  return (err, c) => {
    let response: Response;
    let code: string | undefined;
    let derived = false;

    if (isDerivedError(err)) {
      const context = err.toResponseContext();
      response = err.toResponse();
      code = context.code;
      derived = true;
    } else if (err instanceof HTTPException) {
      response = err.getResponse();
    } else {
      // Don't leak internal details unless asked to
      const context = ResponseContext.builder()
        .statusCode(500)
        .code(INTERNAL_ERROR_CODE)
        .message(options.exposeInternalErrors === true ? err.message : INTERNAL_ERROR_MESSAGE)
        .build();
      response = render(context);
      code = context.code;
    }

    c.set("errorCode", code);

    options.logFn?.({
      requestId: c.get("requestId"),
      status: response.status,
      code,
      derived,
      errorName: err.name,
      message: err.message,
    });

    return response;
  };
}
