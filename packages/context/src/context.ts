/**
 * Response context — the framework-agnostic result of turning an error
 * value into something a response can be rendered from.
 *
 * Every field is optional. Defaults are applied only when the context is
 * rendered, so a context can be passed around (and inspected by a custom
 * renderer) without losing the fact that a field was never set.
 *
 * Rules:
 * - Contexts are immutable once built (frozen)
 * - Builders are immutable too: every setter returns a new builder
 * - A context holds no reference to the error it was built from
 * - Every way of building a context rejects a status outside 200–599,
 *   so any context that exists can be rendered
 */

// =============================================================================
// Status Range
// =============================================================================

/** Lowest status a host `Response` accepts. */
export const MIN_STATUS_CODE = 200;

/** Highest status a host `Response` accepts. */
export const MAX_STATUS_CODE = 599;

export function isValidStatusCode(value: number): boolean {
  return (
    Number.isInteger(value) &&
    value >= MIN_STATUS_CODE &&
    value <= MAX_STATUS_CODE
  );
}

function checkStatusCode(statusCode: number | undefined): void {
  if (statusCode !== undefined && !isValidStatusCode(statusCode)) {
    throw new RangeError(
      `Status code must be an integer between ${MIN_STATUS_CODE} and ${MAX_STATUS_CODE}, got ${statusCode}`,
    );
  }
}

// =============================================================================
// Context
// =============================================================================

export interface ResponseContextFields {
  readonly statusCode?: number | undefined;
  readonly code?: string | undefined;
  readonly message?: string | undefined;
}

export class ResponseContext implements ResponseContextFields {
  readonly statusCode: number | undefined;
  readonly code: string | undefined;
  readonly message: string | undefined;

  private constructor(fields: ResponseContextFields) {
    checkStatusCode(fields.statusCode);
    this.statusCode = fields.statusCode;
    this.code = fields.code;
    this.message = fields.message;
    Object.freeze(this);
  }

  /** A context with no fields set. Renders entirely from defaults. */
  static empty(): ResponseContext {
    return new ResponseContext({});
  }

  static builder(): ResponseContextBuilder {
    return new ResponseContextBuilder({});
  }

  /**
   * @throws {RangeError} if the status is not an integer in 200–599
   */
  static fromFields(fields: ResponseContextFields): ResponseContext {
    return new ResponseContext(fields);
  }

  /** Start a builder pre-filled with this context's fields. */
  toBuilder(): ResponseContextBuilder {
    return new ResponseContextBuilder({
      statusCode: this.statusCode,
      code: this.code,
      message: this.message,
    });
  }

  toJSON(): ResponseContextFields {
    const out: { statusCode?: number; code?: string; message?: string } = {};
    if (this.statusCode !== undefined) out.statusCode = this.statusCode;
    if (this.code !== undefined) out.code = this.code;
    if (this.message !== undefined) out.message = this.message;
    return out;
  }
}

// =============================================================================
// Builder
// =============================================================================

export class ResponseContextBuilder {
  private readonly fields: ResponseContextFields;

  /**
   * @throws {RangeError} if the status is not an integer in 200–599
   */
  constructor(fields: ResponseContextFields = {}) {
    checkStatusCode(fields.statusCode);
    this.fields = fields;
  }

  /**
   * @throws {RangeError} if the status is not an integer in 200–599
   */
  statusCode(statusCode: number): ResponseContextBuilder {
    return new ResponseContextBuilder({ ...this.fields, statusCode });
  }

  code(code: string): ResponseContextBuilder {
    return new ResponseContextBuilder({ ...this.fields, code });
  }

  message(message: string): ResponseContextBuilder {
    return new ResponseContextBuilder({ ...this.fields, message });
  }

  build(): ResponseContext {
    return ResponseContext.fromFields(this.fields);
  }
}

// =============================================================================
// Capability
// =============================================================================

/**
 * Anything that can turn a value of `T` into a response context.
 *
 * Derived error types implement this; nested variants delegate to the
 * capability of their payload's type.
 */
export interface IntoResponseContext<T> {
  intoResponseContext(value: T): ResponseContext;
}

export function isIntoResponseContext(
  value: unknown,
): value is IntoResponseContext<unknown> {
  if (value === null || typeof value !== "object") return false;
  return typeof (value as Record<string, unknown>).intoResponseContext === "function";
}
