/**
 * Type barrel — re-exports all public types from @errmap/node.
 */

// DTOs
export { CreateAccountSchema, AmountSchema } from "./dto.js";
export type { CreateAccountDto, AmountDto } from "./dto.js";

// App env
export type { AppEnv } from "./api-contract.js";
