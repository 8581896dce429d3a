/**
 * Request ID middleware.
 *
 * Propagates an incoming X-Request-Id header, or generates a new id when
 * the request has none. The id is echoed on every response, error
 * responses included, and tags both the request and the error log entries.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

export interface RequestIdOptions {
  /** Id generator for requests without the header. Default: randomUUID */
  readonly generate?: (() => string) | undefined;
}

export function requestIdMiddleware(
  options: RequestIdOptions = {},
): MiddlewareHandler<AppEnv> {
  const generate = options.generate ?? randomUUID;

  return async (c, next) => {
    const existing = c.req.header(REQUEST_ID_HEADER);
    const requestId = existing !== undefined && existing !== "" ? existing : generate();

    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
