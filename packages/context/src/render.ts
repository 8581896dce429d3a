/**
 * Default rendering of a response context into a host `Response`.
 *
 * The body is serialized with RFC 8785 canonical JSON (sorted keys, no
 * whitespace), so a given context always produces the same bytes:
 *
 *   {"error":{"code":"NOT_FOUND","message":"..."},"result":null}
 *
 * Rendering cannot fail: every field has a default, and the builder
 * already refused any status a `Response` would reject.
 */

import { canonicalize } from "json-canonicalize";
import type { ResponseContext } from "./context.js";
import { createErrorEnvelope, resolveContext } from "./envelope.js";

export const JSON_CONTENT_TYPE = "application/json";

// Statuses a Fetch `Response` cannot carry a body with.
const NULL_BODY_STATUSES = new Set([204, 205, 304]);

/**
 * Serialize the envelope for a context with defaults applied.
 */
export function renderBody(context: ResponseContext): string {
  const { code, message } = resolveContext(context);
  return canonicalize(createErrorEnvelope(code, message));
}

/**
 * Render a context into a JSON error response.
 */
export function renderResponse(context: ResponseContext): Response {
  const { statusCode } = resolveContext(context);
  const body = NULL_BODY_STATUSES.has(statusCode) ? null : renderBody(context);

  return new Response(body, {
    status: statusCode,
    headers: { "content-type": JSON_CONTENT_TYPE },
  });
}

/**
 * A function that turns a context into the final response, replacing the
 * default renderer for a whole error type.
 */
export type ResponseRenderer = (context: ResponseContext) => Response;
