/**
 * Error envelope types for rendered responses.
 *
 * All default error responses follow the shape:
 * { result: null, error: { code: string, message: string } }
 */

import type { ResponseContext } from "./context.js";

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_STATUS_CODE = 500;
export const DEFAULT_ERROR_CODE = "UNKNOWN_ERROR";
export const DEFAULT_ERROR_MESSAGE = "An error occurred";

// =============================================================================
// Envelope
// =============================================================================

export interface ErrorDetail {
  readonly code: string;
  readonly message: string;
}

export interface ErrorEnvelope {
  readonly result: null;
  readonly error: ErrorDetail;
}

/**
 * A context with every default applied. This is what the default renderer
 * and any custom renderer that wants the standard fallbacks work from.
 */
export interface ResolvedContext {
  readonly statusCode: number;
  readonly code: string;
  readonly message: string;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(code: string, message: string): ErrorEnvelope {
  return { result: null, error: { code, message } };
}

export function resolveContext(context: ResponseContext): ResolvedContext {
  return {
    statusCode: context.statusCode ?? DEFAULT_STATUS_CODE,
    code: context.code ?? DEFAULT_ERROR_CODE,
    message: context.message ?? DEFAULT_ERROR_MESSAGE,
  };
}
