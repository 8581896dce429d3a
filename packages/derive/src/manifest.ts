/**
 * Error type manifests.
 *
 * Error types can be described in a JSON document instead of code:
 *
 * ```json
 * {
 *   "types": [
 *     {
 *       "name": "AuthError",
 *       "variants": [
 *         { "name": "InvalidToken", "fields": "unit", "message": "Invalid token",
 *           "attributes": { "status_code": "401", "code": "AUTHENTICATION_ERROR" } }
 *       ]
 *     },
 *     {
 *       "name": "ApiError",
 *       "attributes": { "response": { "custom_fn": "plainText" } },
 *       "variants": [
 *         { "name": "Auth", "fields": "unnamed", "inner": "AuthError",
 *           "attributes": { "response": "nested" } }
 *       ]
 *     }
 *   ]
 * }
 * ```
 *
 * `inner` names another type in the same document; types may appear in
 * any order. Every type is derived, so a bad attribute anywhere rejects
 * the whole manifest.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { deriveErrorType } from "./derive.js";
import type { DeriveOptions, DerivedErrorType } from "./derive.js";
import { describeVariants } from "./define.js";
import type { VariantDefinition } from "./define.js";
import { DerivationError } from "./errors.js";
import type { ErrorValue } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

// Passed through untouched: derivation itself rejects unknown names, and
// z.record would drop a "__proto__" key before it got there.
const AttributesSchema = z.custom<Record<string, unknown>>(
  (value) => typeof value === "object" && value !== null && !Array.isArray(value),
  { message: "Expected an object of attributes" },
);

const FieldsSchema = z.union([
  z.literal("unit"),
  z.literal("unnamed"),
  z.object({ named: z.array(z.string()) }).strict(),
]);

export const ManifestVariantSchema = z
  .object({
    name: z.string().min(1),
    fields: FieldsSchema.default("unit"),
    inner: z.string().min(1).optional(),
    message: z.string().optional(),
    attributes: AttributesSchema.optional(),
  })
  .strict();

export const ManifestTypeSchema = z
  .object({
    name: z.string().min(1),
    attributes: AttributesSchema.optional(),
    variants: z.array(ManifestVariantSchema),
  })
  .strict();

export const ManifestSchema = z
  .object({
    types: z.array(ManifestTypeSchema),
  })
  .strict();

export type Manifest = z.infer<typeof ManifestSchema>;
export type ManifestType = z.infer<typeof ManifestTypeSchema>;
export type ManifestVariant = z.infer<typeof ManifestVariantSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Validate a manifest and derive every type in it.
 *
 * @returns derived types keyed by type name, in document order
 * @throws {DerivationError} on a malformed document, an unknown or cyclic
 *   `inner` reference, or any derivation failure
 */
export function loadManifest(
  input: unknown,
  options: DeriveOptions = {},
): ReadonlyMap<string, DerivedErrorType<ErrorValue>> {
  const parsed = ManifestSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new DerivationError(
      "INVALID_MANIFEST",
      `Invalid manifest${where}: ${issue?.message ?? "invalid document"}`,
      { typeName: "<manifest>", stage: "unparsed" },
    );
  }

  const declared = new Map<string, ManifestType>();
  for (const type of parsed.data.types) {
    if (declared.has(type.name)) {
      throw new DerivationError("INVALID_MANIFEST", "Type is declared more than once", {
        typeName: type.name,
        stage: "unparsed",
      });
    }
    declared.set(type.name, type);
  }

  const derived = new Map<string, DerivedErrorType<ErrorValue>>();
  const visiting = new Set<string>();

  const resolve = (type: ManifestType): DerivedErrorType<ErrorValue> => {
    const existing = derived.get(type.name);
    if (existing !== undefined) {
      return existing;
    }
    visiting.add(type.name);

    const definitions: Record<string, VariantDefinition> = {};
    for (const variant of type.variants) {
      definitions[variant.name] = toDefinition(type.name, variant, (innerName) => {
        const inner = declared.get(innerName);
        if (inner === undefined) {
          throw new DerivationError("UNKNOWN_INNER_TYPE", `Unknown inner type "${innerName}"`, {
            typeName: type.name,
            variant: variant.name,
            stage: "unparsed",
          });
        }
        if (visiting.has(innerName)) {
          throw new DerivationError(
            "CYCLIC_INNER_TYPE",
            `Inner type "${innerName}" forms a cycle`,
            { typeName: type.name, variant: variant.name, stage: "unparsed" },
          );
        }
        return resolve(inner);
      });
    }

    const result = deriveErrorType(
      describeVariants<ErrorValue>(type.name, definitions, type.attributes),
      options,
    );
    visiting.delete(type.name);
    derived.set(type.name, result);
    return result;
  };

  const ordered = new Map<string, DerivedErrorType<ErrorValue>>();
  for (const type of declared.values()) {
    ordered.set(type.name, resolve(type));
  }
  return ordered;
}

/**
 * Read a manifest from a JSON file and derive every type in it.
 */
export function loadManifestFile(
  path: string,
  options: DeriveOptions = {},
): ReadonlyMap<string, DerivedErrorType<ErrorValue>> {
  const raw = readFileSync(path, "utf-8");
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DerivationError("INVALID_MANIFEST", `Manifest is not valid JSON: ${reason}`, {
      typeName: path,
      stage: "unparsed",
    });
  }
  return loadManifest(document, options);
}

// =============================================================================
// Helpers
// =============================================================================

function toDefinition(
  typeName: string,
  variant: ManifestVariant,
  resolveInner: (name: string) => DerivedErrorType<ErrorValue>,
): VariantDefinition {
  const attributes = variant.attributes ?? {};
  const { fields } = variant;

  if (typeof fields === "object") {
    return { kind: "named", attributes, message: variant.message, names: fields.named };
  }

  if (variant.inner !== undefined && fields !== "unnamed") {
    throw new DerivationError("INVALID_MANIFEST", "Only unnamed variants can declare an inner type", {
      typeName,
      variant: variant.name,
      stage: "unparsed",
    });
  }

  if (fields === "unit") {
    return { kind: "unit", attributes, message: variant.message };
  }

  if (variant.inner === undefined) {
    return { kind: "unnamed", attributes, message: variant.message };
  }

  // A nested variant reads as its inner value unless it says otherwise.
  return {
    kind: "unnamed",
    attributes,
    message: variant.message ?? "{0}",
    inner: resolveInner(variant.inner),
  };
}
