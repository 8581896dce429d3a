/**
 * @errmap/derive — Derive HTTP error responses from error type descriptions.
 *
 * Provides:
 * - deriveErrorType: description → frozen per-variant rule table
 * - defineErrorType and the unit/unnamed/nested/named helpers
 * - CustomFnRegistry for type-level response overrides
 * - JSON manifest loading
 *
 * @packageDocumentation
 */

// Core types
export type {
  Attributes,
  DerivationStage,
  ErrorTypeDescription,
  ErrorValue,
  FieldShape,
  ResolvedVariantRule,
  Strategy,
  VariantDescription,
  VariantFields,
} from "./types.js";

// Errors
export { DerivationError } from "./errors.js";
export type { DerivationErrorCode, DerivationErrorContext } from "./errors.js";

// Derivation
export {
  deriveErrorType,
  DerivedErrorType,
  DerivedError,
  isDerivedError,
} from "./derive.js";
export type { DeriveOptions } from "./derive.js";
export { extractVariantMetadata, VARIANT_ATTRIBUTES } from "./metadata.js";
export type { VariantMetadata } from "./metadata.js";
export { resolveStrategy, resolveOverride, TYPE_ATTRIBUTES } from "./strategy.js";
export type { ResolvedStrategy, ResolvedOverride } from "./strategy.js";

// Registry
export { CustomFnRegistry, CustomFnRegistryError } from "./registry.js";
export type { CustomFnRegistryErrorCode } from "./registry.js";

// Definition helpers
export {
  defineErrorType,
  describeVariants,
  unit,
  unnamed,
  nested,
  named,
} from "./define.js";
export type {
  ErrorTypeDefinition,
  InnerErrorType,
  NestedOptions,
  ValueOf,
  VariantDefinition,
  VariantDefinitions,
  VariantOptions,
} from "./define.js";
export { parseTemplate, formatTemplate, displayPayload, TemplateError } from "./message.js";
export type { TemplateSegment } from "./message.js";

// Manifests
export {
  loadManifest,
  loadManifestFile,
  ManifestSchema,
} from "./manifest.js";
export type { Manifest, ManifestType, ManifestVariant } from "./manifest.js";
