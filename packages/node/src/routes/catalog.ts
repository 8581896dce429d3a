/**
 * Error catalog route.
 *
 * GET /errors — The resolved rule table of every error type the service
 * can raise: per variant its strategy, status and code, plus the name of
 * the type-level custom function when there is one.
 */

import { Hono } from "hono";
import type { DerivedErrorType, ResolvedVariantRule } from "@errmap/derive";
import type { AppEnv } from "../types/api-contract.js";

/** The parts of a derived error type the catalog reads. */
export type CatalogSource = Pick<DerivedErrorType, "name" | "override" | "rules">;

export interface CatalogEntry {
  readonly name: string;
  readonly override: string | null;
  readonly rules: readonly ResolvedVariantRule[];
}

export function describeErrorTypes(
  types: readonly CatalogSource[],
): readonly CatalogEntry[] {
  return types.map((type) => ({
    name: type.name,
    override: type.override ?? null,
    rules: type.rules,
  }));
}

export function createCatalogRoute(
  types: readonly CatalogSource[],
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const catalog = describeErrorTypes(types);

  routes.get("/errors", (c) => c.json({ data: catalog }));

  return routes;
}
