/**
 * Core types for error type descriptions and their derived rules.
 *
 * A description is the input to derivation: a named tagged union whose
 * variants carry raw, unvalidated attributes. Derivation turns it into a
 * table of resolved rules, one per variant.
 */

import type { IntoResponseContext } from "@errmap/context";

// =============================================================================
// Description (derivation input)
// =============================================================================

/**
 * Payload shape of a variant.
 *
 * - `unit`: no payload
 * - `unnamed`: exactly one positional payload
 * - `named`: named fields (always rejected by derivation)
 */
export type FieldShape = "unit" | "unnamed" | "named";

export type VariantFields =
  | { readonly kind: "unit" }
  | {
      readonly kind: "unnamed";
      /** Context capability of the payload's type. Required for `nested`. */
      readonly inner?: IntoResponseContext<unknown> | undefined;
    }
  | { readonly kind: "named"; readonly names: readonly string[] };

/**
 * Raw attributes, as written by the author of the error type.
 * Values are validated during derivation, not here.
 */
export type Attributes = Readonly<Record<string, unknown>>;

export interface VariantDescription {
  readonly name: string;
  readonly fields: VariantFields;
  readonly attributes?: Attributes | undefined;
}

/**
 * A value of some error type: the variant tag and, for `unnamed`
 * variants, its payload.
 */
export interface ErrorValue {
  readonly variant: string;
  readonly payload?: unknown;
}

export interface ErrorTypeDescription<V extends ErrorValue = ErrorValue> {
  readonly name: string;
  readonly variants: readonly VariantDescription[];
  /** Type-level attributes (`response: { custom_fn }`). */
  readonly attributes?: Attributes | undefined;
  /** The type's own human-readable message for a value. */
  describe(value: V): string;
}

// =============================================================================
// Derived rules
// =============================================================================

export type Strategy = "general" | "nested";

/**
 * The resolved rule for one variant.
 *
 * `statusCode` and `code` stay undefined when the variant did not set them;
 * defaults (500, the variant name) are applied when a context is built.
 */
export interface ResolvedVariantRule {
  readonly variant: string;
  readonly shape: Exclude<FieldShape, "named">;
  readonly statusCode: number | undefined;
  readonly code: string | undefined;
  readonly strategy: Strategy;
}

/**
 * Progress of a single derivation.
 *
 * unparsed → metadata-extracted → strategy-resolved → emitted
 *
 * A `DerivationError` records the last stage reached before rejection.
 */
export type DerivationStage =
  | "unparsed"
  | "metadata-extracted"
  | "strategy-resolved"
  | "emitted";
