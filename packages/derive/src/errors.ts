/**
 * Derivation-time configuration errors.
 *
 * Any malformed description aborts derivation of the whole type. These
 * are always thrown; nothing is silently replaced by a default.
 */

import { inspect } from "node:util";
import type { DerivationStage } from "./types.js";

export type DerivationErrorCode =
  | "INVALID_NAME"
  | "DUPLICATE_VARIANT"
  | "UNKNOWN_ATTRIBUTE"
  | "INVALID_STATUS_CODE"
  | "INVALID_CODE"
  | "INVALID_MESSAGE"
  | "NAMED_FIELDS_UNSUPPORTED"
  | "UNKNOWN_RESPONSE_TYPE"
  | "NESTED_WITHOUT_INNER"
  | "INVALID_INNER"
  | "INVALID_CUSTOM_FN"
  | "UNKNOWN_CUSTOM_FN"
  | "INVALID_MANIFEST"
  | "UNKNOWN_INNER_TYPE"
  | "CYCLIC_INNER_TYPE";

export interface DerivationErrorContext {
  readonly typeName: string;
  readonly variant?: string | undefined;
  readonly stage: DerivationStage;
}

export class DerivationError extends Error {
  public readonly code: DerivationErrorCode;
  public readonly typeName: string;
  public readonly variant: string | undefined;
  /** Last stage the derivation reached before it was rejected. */
  public readonly stage: DerivationStage;

  constructor(
    code: DerivationErrorCode,
    message: string,
    context: DerivationErrorContext,
  ) {
    const where =
      context.variant !== undefined
        ? `${context.typeName}::${context.variant}`
        : context.typeName;
    super(`${where}: ${message}`);
    this.name = "DerivationError";
    this.code = code;
    this.typeName = context.typeName;
    this.variant = context.variant;
    this.stage = context.stage;
  }
}

/** Render a raw attribute value for an error message. */
export function formatRaw(value: unknown): string {
  return inspect(value, { depth: 2, breakLength: Infinity });
}
