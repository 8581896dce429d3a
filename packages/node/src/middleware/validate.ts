/**
 * Zod request body validation.
 *
 * Failures are thrown as ApiError values: BadRequest for a body that is
 * not JSON, ValidationFailed naming the first schema issue otherwise.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../errors.js";

/**
 * Parse and validate the JSON request body against a Zod schema.
 */
export async function parseBody<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw ApiError.create({ variant: "BadRequest", payload: "Invalid JSON in request body" });
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw ApiError.create({ variant: "ValidationFailed", payload: formatZodError(result.error) });
  }
  return result.data;
}

export function formatZodError(error: ZodError): string {
  const issue = error.issues[0];
  if (issue === undefined) {
    return "invalid request body";
  }
  const path = issue.path.join(".");
  return path === "" ? issue.message : `${path}: ${issue.message}`;
}
