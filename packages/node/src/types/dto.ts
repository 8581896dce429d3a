/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body validation.
 */

import { z } from "zod";

// =============================================================================
// Account DTOs
// =============================================================================

export const CreateAccountSchema = z.object({
  id: z
    .string()
    .min(1)
    .max(64)
    .regex(/^[a-z0-9-]+$/, "must contain only lowercase letters, digits and dashes"),
  owner: z.string().min(1).max(256),
  balance: z.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(0),
});

export type CreateAccountDto = z.infer<typeof CreateAccountSchema>;

export const AmountSchema = z.object({
  amount: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
});

export type AmountDto = z.infer<typeof AmountSchema>;
