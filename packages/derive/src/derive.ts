/**
 * Derivation driver.
 *
 * Turns an ErrorTypeDescription into a DerivedErrorType: a frozen table of
 * per-variant rules plus the functions that apply them to error values.
 *
 * Rules:
 * - Derivation runs once per type; applying the rules is pure
 * - Every variant resolves to exactly one strategy, or derivation throws
 * - A rejected type is never emitted, not even partially
 * - Defaults for status and code are applied per value, not stored
 */

import {
  DEFAULT_STATUS_CODE,
  ResponseContext,
  renderResponse,
} from "@errmap/context";
import type {
  IntoResponseContext,
  ResponseRenderer,
} from "@errmap/context";
import { DerivationError } from "./errors.js";
import { extractVariantMetadata } from "./metadata.js";
import { resolveOverride, resolveStrategy } from "./strategy.js";
import type { ResolvedStrategy } from "./strategy.js";
import type { CustomFnRegistry } from "./registry.js";
import type {
  ErrorTypeDescription,
  ErrorValue,
  ResolvedVariantRule,
} from "./types.js";

// =============================================================================
// Options
// =============================================================================

export interface DeriveOptions {
  /** Registry that type-level `custom_fn` names resolve against. */
  readonly registry?: CustomFnRegistry | undefined;
}

type CompiledVariant = ResolvedStrategy & { readonly rule: ResolvedVariantRule };

// =============================================================================
// Derived Error (throwable value)
// =============================================================================

/**
 * A throwable instance of a derived error type.
 *
 * The message is the type's own description of the value. The instance
 * keeps a reference to its type so a boundary that catches it can turn it
 * into a response without knowing the type up front.
 */
export class DerivedError<V extends ErrorValue = ErrorValue> extends Error {
  public readonly value: V;
  public readonly errorType: DerivedErrorType<V>;

  constructor(errorType: DerivedErrorType<V>, value: V) {
    super(errorType.describe(value));
    this.name = errorType.name;
    this.value = value;
    this.errorType = errorType;
  }

  get variant(): V["variant"] {
    return this.value.variant;
  }

  get payload(): unknown {
    return this.value.payload;
  }

  toResponseContext(): ResponseContext {
    return this.errorType.intoResponseContext(this.value);
  }

  toResponse(): Response {
    return this.errorType.intoResponse(this.value);
  }
}

export function isDerivedError(value: unknown): value is DerivedError {
  return value instanceof DerivedError;
}

// =============================================================================
// Derived Error Type
// =============================================================================

export class DerivedErrorType<V extends ErrorValue = ErrorValue>
  implements IntoResponseContext<V | DerivedError<V>>
{
  readonly name: string;
  /** Resolved rules, in declaration order. */
  readonly rules: readonly ResolvedVariantRule[];
  /** Name of the type-level custom function, if any. */
  readonly override: string | undefined;

  private readonly _variants: ReadonlyMap<string, CompiledVariant>;
  private readonly _describe: (value: V) => string;
  private readonly _render: ResponseRenderer;

  /**
   * Derive the rules for `description`. Same as deriveErrorType().
   *
   * @throws {DerivationError} if any variant or type attribute is malformed
   */
  constructor(description: ErrorTypeDescription<V>, options: DeriveOptions = {}) {
    const variants = compileVariants(description);
    const override = resolveOverride(description.name, description.attributes, options.registry);

    this.name = description.name;
    this._variants = variants;
    this.rules = Object.freeze([...variants.values()].map((v) => v.rule));
    this._describe = (value) => description.describe(value);
    this.override = override?.name;
    this._render = override?.render ?? renderResponse;
    Object.freeze(this);
  }

  /**
   * Build the response context for a value.
   *
   * @throws {TypeError} if the value's variant does not belong to this type
   */
  intoResponseContext(value: V | DerivedError<V>): ResponseContext {
    const plain = unwrap(value);
    const compiled = this._variants.get(plain.variant);
    if (compiled === undefined) {
      throw new TypeError(`"${plain.variant}" is not a variant of ${this.name}`);
    }

    if (compiled.strategy === "nested") {
      return compiled.inner.intoResponseContext(plain.payload);
    }

    const { rule } = compiled;
    return ResponseContext.builder()
      .statusCode(rule.statusCode ?? DEFAULT_STATUS_CODE)
      .code(rule.code ?? rule.variant)
      .message(this._describe(plain))
      .build();
  }

  /**
   * Build the final response: through the type's custom function when it
   * declares one, otherwise through the default JSON renderer.
   */
  intoResponse(value: V | DerivedError<V>): Response {
    return this._render(this.intoResponseContext(value));
  }

  describe(value: V | DerivedError<V>): string {
    return this._describe(unwrap(value));
  }

  create(value: V): DerivedError<V> {
    return new DerivedError(this, value);
  }

  /** True if `value` is a thrown instance of this type. */
  is(value: unknown): value is DerivedError<V> {
    return value instanceof DerivedError && value.errorType === this;
  }

  rule(variant: string): ResolvedVariantRule | undefined {
    return this._variants.get(variant)?.rule;
  }

  hasVariant(variant: string): boolean {
    return this._variants.has(variant);
  }
}

function unwrap<V extends ErrorValue>(value: V | DerivedError<V>): V {
  return value instanceof DerivedError ? value.value : value;
}

// =============================================================================
// Driver
// =============================================================================

/**
 * Derive the response rules for an error type.
 *
 * @throws {DerivationError} if any variant or type attribute is malformed
 */
export function deriveErrorType<V extends ErrorValue>(
  description: ErrorTypeDescription<V>,
  options: DeriveOptions = {},
): DerivedErrorType<V> {
  return new DerivedErrorType(description, options);
}

function compileVariants(
  description: Pick<ErrorTypeDescription, "name" | "variants">,
): ReadonlyMap<string, CompiledVariant> {
  const typeName = description.name;

  if (typeof typeName !== "string" || typeName.trim() === "") {
    throw new DerivationError("INVALID_NAME", "Error type name cannot be empty", {
      typeName: String(typeName),
      stage: "unparsed",
    });
  }

  const variants = new Map<string, CompiledVariant>();

  for (const variant of description.variants) {
    if (typeof variant.name !== "string" || variant.name.trim() === "") {
      throw new DerivationError("INVALID_NAME", "Variant name cannot be empty", {
        typeName,
        stage: "unparsed",
      });
    }
    if (variants.has(variant.name)) {
      throw new DerivationError("DUPLICATE_VARIANT", "Variant is declared more than once", {
        typeName,
        variant: variant.name,
        stage: "unparsed",
      });
    }

    const metadata = extractVariantMetadata(typeName, variant);
    const resolved = resolveStrategy(typeName, variant, metadata);

    const rule: ResolvedVariantRule = Object.freeze({
      variant: metadata.variant,
      shape: metadata.shape,
      statusCode: metadata.statusCode,
      code: metadata.code,
      strategy: resolved.strategy,
    });

    variants.set(variant.name, { ...resolved, rule });
  }

  return variants;
}
