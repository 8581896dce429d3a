/**
 * Strategy dispatch.
 *
 * Per variant, decides how a response context is computed:
 * - no `response` attribute, or `response: "general"` → general
 * - `response: "nested"` → delegate to the payload's own capability
 * - anything else → rejected
 *
 * Per type, resolves the optional `response: { custom_fn }` override that
 * replaces default rendering for every variant.
 */

import { z } from "zod";
import { isIntoResponseContext } from "@errmap/context";
import type { IntoResponseContext, ResponseRenderer } from "@errmap/context";
import { DerivationError, formatRaw } from "./errors.js";
import type { VariantMetadata } from "./metadata.js";
import type { CustomFnRegistry } from "./registry.js";
import type { Attributes, VariantDescription } from "./types.js";

// =============================================================================
// Variant strategy
// =============================================================================

export const ResponseTypeSchema = z.enum(["general", "nested"]);

export type ResolvedStrategy =
  | { readonly strategy: "general" }
  | {
      readonly strategy: "nested";
      readonly inner: IntoResponseContext<unknown>;
    };

export function resolveStrategy(
  typeName: string,
  variant: VariantDescription,
  metadata: VariantMetadata,
): ResolvedStrategy {
  const context = {
    typeName,
    variant: metadata.variant,
    stage: "metadata-extracted",
  } as const;

  const raw = variant.attributes?.["response"];
  if (raw === undefined) {
    return { strategy: "general" };
  }

  const parsed = ResponseTypeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DerivationError(
      "UNKNOWN_RESPONSE_TYPE",
      `Unknown response type: ${formatRaw(raw)} (expected "general" or "nested")`,
      context,
    );
  }

  if (parsed.data === "general") {
    return { strategy: "general" };
  }

  const fields = variant.fields;
  if (fields.kind === "named") {
    throw new DerivationError(
      "NAMED_FIELDS_UNSUPPORTED",
      "Named fields are not supported for nested responses",
      context,
    );
  }
  if (fields.kind === "unit") {
    throw new DerivationError(
      "NESTED_WITHOUT_INNER",
      "Nested response requires a payload: there is no inner value capable of producing a context",
      context,
    );
  }
  if (!isIntoResponseContext(fields.inner)) {
    throw new DerivationError(
      "INVALID_INNER",
      "Nested response requires the payload type to implement intoResponseContext",
      context,
    );
  }

  return { strategy: "nested", inner: fields.inner };
}

// =============================================================================
// Type-level override
// =============================================================================

export const CustomFnAttributeSchema = z
  .object({ custom_fn: z.string().min(1) })
  .strict();

/** Attribute names an error type may carry. */
export const TYPE_ATTRIBUTES: ReadonlySet<string> = new Set(["response"]);

export interface ResolvedOverride {
  readonly name: string;
  readonly render: ResponseRenderer;
}

export function resolveOverride(
  typeName: string,
  attributes: Attributes | undefined,
  registry: CustomFnRegistry | undefined,
): ResolvedOverride | undefined {
  const context = { typeName, stage: "strategy-resolved" } as const;
  const attrs = attributes ?? {};

  for (const key of Object.keys(attrs)) {
    if (!TYPE_ATTRIBUTES.has(key)) {
      throw new DerivationError(
        "UNKNOWN_ATTRIBUTE",
        `Unknown type attribute "${key}" (expected: response)`,
        context,
      );
    }
  }

  const raw = attrs["response"];
  if (raw === undefined) {
    return undefined;
  }

  const parsed = CustomFnAttributeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DerivationError(
      "INVALID_CUSTOM_FN",
      `Invalid type-level response ${formatRaw(raw)} (expected { custom_fn: "<name>" })`,
      context,
    );
  }

  const name = parsed.data.custom_fn;
  const render = registry?.get(name);
  if (render === undefined) {
    throw new DerivationError(
      "UNKNOWN_CUSTOM_FN",
      `Custom response function "${name}" is not registered`,
      context,
    );
  }

  return { name, render };
}
