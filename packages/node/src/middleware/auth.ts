/**
 * Authentication middleware.
 *
 * Checks the `Authorization: Bearer <token>` header against the configured
 * tokens. Failures are thrown as ApiError.Auth, which nests AuthError, so
 * the global error handler renders them with AuthError's status and code.
 *
 * On success, sets `c.set("token", token)`.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { authFailure } from "../errors.js";

const BEARER_PREFIX = "Bearer ";

export interface AuthConfig {
  /** Accepted bearer tokens */
  readonly tokens: ReadonlySet<string>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header("Authorization");
    if (header === undefined || !header.startsWith(BEARER_PREFIX)) {
      throw authFailure("MissingToken");
    }

    const token = header.slice(BEARER_PREFIX.length).trim();
    if (!config.tokens.has(token)) {
      throw authFailure("InvalidToken");
    }

    c.set("token", token);
    await next();
  };
}
