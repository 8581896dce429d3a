/**
 * Variant metadata extraction.
 *
 * Reads a variant's raw attributes and field shape and validates them:
 * - `status_code`: numeric string or integer, 200–599
 * - `code`: non-empty string
 * - `response`: left to the strategy dispatcher
 * - named-field variants are rejected outright
 *
 * Absent values stay undefined. Malformed values throw.
 */

import { z } from "zod";
import { MAX_STATUS_CODE, MIN_STATUS_CODE } from "@errmap/context";
import { DerivationError, formatRaw } from "./errors.js";
import type { FieldShape, VariantDescription } from "./types.js";

// =============================================================================
// Schemas
// =============================================================================

export const StatusCodeSchema = z
  .union([
    z
      .string()
      .regex(/^\d+$/, "Expected a numeric string")
      .transform((value) => Number(value)),
    z.number(),
  ])
  .pipe(z.number().int().min(MIN_STATUS_CODE).max(MAX_STATUS_CODE));

export const CodeSchema = z.string().min(1, "Code cannot be empty");

/** Attribute names a variant may carry. */
export const VARIANT_ATTRIBUTES: ReadonlySet<string> = new Set([
  "status_code",
  "code",
  "response",
]);

// =============================================================================
// Extraction
// =============================================================================

export interface VariantMetadata {
  readonly variant: string;
  readonly shape: Exclude<FieldShape, "named">;
  readonly statusCode: number | undefined;
  readonly code: string | undefined;
}

export function extractVariantMetadata(
  typeName: string,
  variant: VariantDescription,
): VariantMetadata {
  const context = { typeName, variant: variant.name, stage: "unparsed" } as const;

  if (variant.fields.kind === "named") {
    throw new DerivationError(
      "NAMED_FIELDS_UNSUPPORTED",
      "Named fields are not supported in error variants; use a single unnamed payload",
      context,
    );
  }

  const attributes = variant.attributes ?? {};

  for (const key of Object.keys(attributes)) {
    if (!VARIANT_ATTRIBUTES.has(key)) {
      throw new DerivationError(
        "UNKNOWN_ATTRIBUTE",
        `Unknown attribute "${key}" (expected one of: ${[...VARIANT_ATTRIBUTES].join(", ")})`,
        context,
      );
    }
  }

  let statusCode: number | undefined;
  const rawStatus = attributes["status_code"];
  if (rawStatus !== undefined) {
    const parsed = StatusCodeSchema.safeParse(rawStatus);
    if (!parsed.success) {
      throw new DerivationError(
        "INVALID_STATUS_CODE",
        `Invalid status_code ${formatRaw(rawStatus)}: ${firstIssue(parsed.error)}`,
        context,
      );
    }
    statusCode = parsed.data;
  }

  let code: string | undefined;
  const rawCode = attributes["code"];
  if (rawCode !== undefined) {
    const parsed = CodeSchema.safeParse(rawCode);
    if (!parsed.success) {
      throw new DerivationError(
        "INVALID_CODE",
        `Invalid code ${formatRaw(rawCode)}: ${firstIssue(parsed.error)}`,
        context,
      );
    }
    code = parsed.data;
  }

  return {
    variant: variant.name,
    shape: variant.fields.kind,
    statusCode,
    code,
  };
}

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? "invalid value";
}
