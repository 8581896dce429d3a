/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAccountRoutes } from "./accounts.js";
export { createCatalogRoute, describeErrorTypes } from "./catalog.js";
export type { CatalogEntry, CatalogSource } from "./catalog.js";
