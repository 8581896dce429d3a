/**
 * Typed front end for describing and deriving error types.
 *
 * Usage:
 * ```ts
 * const AuthError = defineErrorType({
 *   name: "AuthError",
 *   variants: {
 *     MissingToken: unit({ status_code: "401", code: "AUTHENTICATION_ERROR", message: "Missing token" }),
 *     Forbidden: unnamed<string>({ status_code: "403", message: "Forbidden: {0}" }),
 *   },
 * });
 *
 * const ApiError = defineErrorType({
 *   name: "ApiError",
 *   variants: {
 *     BadRequest: unnamed<string>({ status_code: "400", code: "BAD_REQUEST", message: "Bad request: {0}" }),
 *     Auth: nested(AuthError),
 *   },
 * });
 *
 * throw ApiError.create({ variant: "BadRequest", payload: "bad input" });
 * ```
 *
 * Variant order is the key order of `variants`.
 */

import type { IntoResponseContext } from "@errmap/context";
import { deriveErrorType } from "./derive.js";
import type { DeriveOptions, DerivedError, DerivedErrorType } from "./derive.js";
import { DerivationError } from "./errors.js";
import {
  TemplateError,
  displayPayload,
  formatTemplate,
  parseTemplate,
  usesPayload,
} from "./message.js";
import type { TemplateSegment } from "./message.js";
import type {
  Attributes,
  ErrorTypeDescription,
  ErrorValue,
  FieldShape,
  VariantDescription,
  VariantFields,
} from "./types.js";

// =============================================================================
// Variant definitions
// =============================================================================

export interface VariantOptions {
  readonly status_code?: string | number | undefined;
  readonly code?: string | undefined;
  readonly response?: string | undefined;
  /** Message template; `{0}` is the payload. Defaults to the variant name. */
  readonly message?: string | undefined;
}

/** What a nested variant needs from its payload's type. */
export interface InnerErrorType extends IntoResponseContext<unknown> {
  describe(value: unknown): string;
}

export interface VariantDefinition<K extends FieldShape = FieldShape, P = unknown> {
  readonly kind: K;
  readonly attributes: Attributes;
  readonly message?: string | undefined;
  readonly inner?: InnerErrorType | undefined;
  readonly names?: readonly string[] | undefined;
  /** Carries the payload type for inference. Never set at runtime. */
  readonly __payload?: P;
}

function toAttributes(options: VariantOptions): Attributes {
  const attributes: Record<string, unknown> = {};
  if (options.status_code !== undefined) attributes["status_code"] = options.status_code;
  if (options.code !== undefined) attributes["code"] = options.code;
  if (options.response !== undefined) attributes["response"] = options.response;
  return attributes;
}

export function unit(options: VariantOptions = {}): VariantDefinition<"unit", never> {
  return { kind: "unit", attributes: toAttributes(options), message: options.message };
}

export function unnamed<P>(options: VariantOptions = {}): VariantDefinition<"unnamed", P> {
  return { kind: "unnamed", attributes: toAttributes(options), message: options.message };
}

export interface NestedOptions {
  /** Message template; `{0}` is the inner value's message. */
  readonly message?: string | undefined;
}

/**
 * A variant wrapping a value of another derived type. Its response context
 * comes from that type, so it takes no status or code of its own. The
 * message defaults to the inner value's own message.
 */
export function nested<IV extends ErrorValue>(
  inner: DerivedErrorType<IV>,
  options: NestedOptions = {},
): VariantDefinition<"unnamed", IV | DerivedError<IV>> {
  return {
    kind: "unnamed",
    attributes: { response: "nested" },
    message: options.message ?? "{0}",
    inner,
  };
}

/** Named-field variant. Derivation always rejects these. */
export function named(
  names: readonly string[],
  options: VariantOptions = {},
): VariantDefinition<"named", never> {
  return { kind: "named", attributes: toAttributes(options), message: options.message, names };
}

// =============================================================================
// Error type definition
// =============================================================================

export type VariantDefinitions = Readonly<Record<string, VariantDefinition>>;

/** The value union described by a set of variant definitions. */
export type ValueOf<D extends VariantDefinitions> = Extract<
  {
    [K in keyof D & string]: D[K] extends VariantDefinition<"unnamed", infer P>
      ? { readonly variant: K; readonly payload: P }
      : { readonly variant: K };
  }[keyof D & string],
  ErrorValue
>;

export interface ErrorTypeDefinition<D extends VariantDefinitions> {
  readonly name: string;
  readonly variants: D;
  readonly attributes?: Attributes | undefined;
  /** Overrides the template-based messages entirely. */
  readonly describe?: ((value: ValueOf<D>) => string) | undefined;
}

/**
 * Describe an error type from an object literal and derive it.
 *
 * @throws {DerivationError} if a message template or any attribute is malformed
 */
export function defineErrorType<D extends VariantDefinitions>(
  definition: ErrorTypeDefinition<D>,
  options: DeriveOptions = {},
): DerivedErrorType<ValueOf<D>> {
  const description = describeVariants<ValueOf<D>>(
    definition.name,
    definition.variants,
    definition.attributes,
  );
  const describe = definition.describe;

  return deriveErrorType<ValueOf<D>>(
    describe !== undefined ? { ...description, describe } : description,
    options,
  );
}

/**
 * Build a description from variant definitions, with messages taken from
 * each variant's template.
 *
 * @throws {DerivationError} if a message template is malformed
 */
export function describeVariants<V extends ErrorValue>(
  name: string,
  definitions: VariantDefinitions,
  attributes?: Attributes,
): ErrorTypeDescription<V> {
  const templates = new Map<string, readonly TemplateSegment[]>();
  const inners = new Map<string, InnerErrorType>();
  const variants: VariantDescription[] = [];

  for (const [variant, def] of Object.entries(definitions)) {
    if (def.message !== undefined) {
      templates.set(variant, compileMessage(name, variant, def));
    }
    if (def.inner !== undefined) {
      inners.set(variant, def.inner);
    }
    variants.push({ name: variant, fields: toFields(def), attributes: def.attributes });
  }

  const describe = (value: ErrorValue): string => {
    const segments = templates.get(value.variant);
    if (segments === undefined) {
      return value.variant;
    }
    const inner = inners.get(value.variant);
    const payload =
      inner !== undefined ? inner.describe(value.payload) : displayPayload(value.payload);
    return formatTemplate(segments, payload);
  };

  return { name, variants, attributes, describe };
}

function toFields(def: VariantDefinition): VariantFields {
  switch (def.kind) {
    case "unit":
      return { kind: "unit" };
    case "unnamed":
      return { kind: "unnamed", inner: def.inner };
    case "named":
      return { kind: "named", names: def.names ?? [] };
  }
}

function compileMessage(
  typeName: string,
  variant: string,
  def: VariantDefinition,
): readonly TemplateSegment[] {
  const context = { typeName, variant, stage: "unparsed" } as const;
  let segments: readonly TemplateSegment[];
  try {
    segments = parseTemplate(def.message ?? "");
  } catch (err) {
    if (err instanceof TemplateError) {
      throw new DerivationError("INVALID_MESSAGE", `Invalid message template: ${err.message}`, context);
    }
    throw err;
  }
  if (def.kind === "unit" && usesPayload(segments)) {
    throw new DerivationError(
      "INVALID_MESSAGE",
      "Message template uses {0} but the variant has no payload",
      context,
    );
  }
  return segments;
}
