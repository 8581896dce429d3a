/**
 * Tests for ResponseContext and its builder.
 *
 * Verifies:
 * - Builder setters return new builders (no shared state)
 * - Built contexts are frozen
 * - Status code range checks
 * - isIntoResponseContext narrowing
 */

import { describe, it, expect } from "vitest";
import {
  ResponseContext,
  isIntoResponseContext,
  isValidStatusCode,
} from "../src/context.js";

// =============================================================================
// Builder
// =============================================================================

describe("ResponseContext.builder", () => {
  it("builds a context with every field set", () => {
    const ctx = ResponseContext.builder()
      .statusCode(404)
      .code("NOT_FOUND")
      .message("Resource not found")
      .build();

    expect(ctx.statusCode).toBe(404);
    expect(ctx.code).toBe("NOT_FOUND");
    expect(ctx.message).toBe("Resource not found");
  });

  it("leaves unset fields undefined", () => {
    const ctx = ResponseContext.builder().code("ONLY_CODE").build();

    expect(ctx.statusCode).toBeUndefined();
    expect(ctx.code).toBe("ONLY_CODE");
    expect(ctx.message).toBeUndefined();
  });

  it("setters return a new builder and leave the original untouched", () => {
    const base = ResponseContext.builder().code("BASE");
    const withStatus = base.statusCode(418);

    expect(base.build().statusCode).toBeUndefined();
    expect(withStatus.build().statusCode).toBe(418);
    expect(withStatus.build().code).toBe("BASE");
  });

  it("a later setter call overrides an earlier one", () => {
    const ctx = ResponseContext.builder().code("FIRST").code("SECOND").build();
    expect(ctx.code).toBe("SECOND");
  });

  it("rejects statuses a response cannot carry", () => {
    const builder = ResponseContext.builder();
    expect(() => builder.statusCode(199)).toThrow(RangeError);
    expect(() => builder.statusCode(600)).toThrow(RangeError);
    expect(() => builder.statusCode(404.5)).toThrow(RangeError);
    expect(() => builder.statusCode(Number.NaN)).toThrow(RangeError);
  });
});

// =============================================================================
// Context
// =============================================================================

describe("ResponseContext", () => {
  it("empty() has no fields", () => {
    const ctx = ResponseContext.empty();
    expect(ctx.toJSON()).toEqual({});
  });

  it("is frozen once built", () => {
    const ctx = ResponseContext.builder().statusCode(400).build();
    expect(Object.isFrozen(ctx)).toBe(true);
  });

  it("toBuilder copies fields into a fresh builder", () => {
    const original = ResponseContext.builder()
      .statusCode(401)
      .code("AUTHENTICATION_ERROR")
      .message("Token expired")
      .build();

    const changed = original.toBuilder().message("Token revoked").build();

    expect(changed.statusCode).toBe(401);
    expect(changed.code).toBe("AUTHENTICATION_ERROR");
    expect(changed.message).toBe("Token revoked");
    expect(original.message).toBe("Token expired");
  });

  it("toJSON omits unset fields", () => {
    const ctx = ResponseContext.builder().statusCode(409).message("Conflict").build();
    expect(ctx.toJSON()).toEqual({ statusCode: 409, message: "Conflict" });
  });
});

// =============================================================================
// Helpers
// =============================================================================

describe("isValidStatusCode", () => {
  it("accepts the 200–599 range", () => {
    expect(isValidStatusCode(200)).toBe(true);
    expect(isValidStatusCode(500)).toBe(true);
    expect(isValidStatusCode(599)).toBe(true);
  });

  it("rejects values outside the range or non-integers", () => {
    expect(isValidStatusCode(100)).toBe(false);
    expect(isValidStatusCode(600)).toBe(false);
    expect(isValidStatusCode(201.1)).toBe(false);
  });
});

describe("isIntoResponseContext", () => {
  it("accepts objects exposing intoResponseContext", () => {
    const capability = {
      intoResponseContext: () => ResponseContext.empty(),
    };
    expect(isIntoResponseContext(capability)).toBe(true);
  });

  it("rejects everything else", () => {
    expect(isIntoResponseContext(null)).toBe(false);
    expect(isIntoResponseContext(undefined)).toBe(false);
    expect(isIntoResponseContext("nested")).toBe(false);
    expect(isIntoResponseContext({ intoResponseContext: "no" })).toBe(false);
  });
});
