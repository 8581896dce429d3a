/**
 * Tests for defineErrorType and the variant helpers.
 *
 * Verifies:
 * - Variant order follows the object literal
 * - Message templates drive DerivedError messages and contexts
 * - nested() marks the variant and defaults its message to the inner one
 * - Template errors reject derivation
 */

import { describe, it, expect } from "vitest";
import { defineErrorType, named, nested, unit, unnamed } from "../src/define.js";
import { CustomFnRegistry } from "../src/registry.js";
import { captureDerivationError } from "./helpers.js";

function createTypes() {
  const AuthError = defineErrorType({
    name: "AuthError",
    variants: {
      MissingToken: unit({
        status_code: "401",
        code: "AUTHENTICATION_ERROR",
        message: "Missing bearer token",
      }),
      Forbidden: unnamed<string>({ status_code: "403", code: "FORBIDDEN", message: "Forbidden: {0}" }),
    },
  });

  const ApiError = defineErrorType({
    name: "ApiError",
    variants: {
      BadRequest: unnamed<string>({
        status_code: "400",
        code: "BAD_REQUEST",
        message: "Bad request: {0}",
      }),
      NotFound: unnamed<number>({ status_code: 404, message: "No account {0}" }),
      Auth: nested(AuthError),
      Internal: unit(),
    },
  });

  return { AuthError, ApiError };
}

describe("defineErrorType", () => {
  it("keeps the variant order of the object literal", () => {
    const { ApiError } = createTypes();
    expect(ApiError.rules.map((r) => r.variant)).toEqual([
      "BadRequest",
      "NotFound",
      "Auth",
      "Internal",
    ]);
  });

  it("formats the payload into the message template", async () => {
    const { ApiError } = createTypes();
    const err = ApiError.create({ variant: "BadRequest", payload: "bad input" });

    expect(err.message).toBe("Bad request: bad input");

    const res = err.toResponse();
    expect(res.status).toBe(400);
    expect(await res.text()).toBe(
      '{"error":{"code":"BAD_REQUEST","message":"Bad request: bad input"},"result":null}',
    );
  });

  it("stringifies non-string payloads", () => {
    const { ApiError } = createTypes();
    const ctx = ApiError.intoResponseContext({ variant: "NotFound", payload: 42 });

    expect(ctx.toJSON()).toEqual({ statusCode: 404, code: "NotFound", message: "No account 42" });
  });

  it("uses the variant name when there is no template", () => {
    const { ApiError } = createTypes();
    const ctx = ApiError.intoResponseContext({ variant: "Internal" });

    expect(ctx.toJSON()).toEqual({ statusCode: 500, code: "Internal", message: "Internal" });
  });

  it("nested() delegates the context and the message to the inner type", async () => {
    const { AuthError, ApiError } = createTypes();
    const err = ApiError.create({
      variant: "Auth",
      payload: AuthError.create({ variant: "Forbidden", payload: "admin only" }),
    });

    expect(err.message).toBe("Forbidden: admin only");
    expect(ApiError.rule("Auth")?.strategy).toBe("nested");

    const res = err.toResponse();
    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      result: null,
      error: { code: "FORBIDDEN", message: "Forbidden: admin only" },
    });
  });

  it("nested() accepts a plain inner value as well", () => {
    const { ApiError } = createTypes();
    const ctx = ApiError.intoResponseContext({
      variant: "Auth",
      payload: { variant: "MissingToken" },
    });

    expect(ctx.toJSON()).toEqual({
      statusCode: 401,
      code: "AUTHENTICATION_ERROR",
      message: "Missing bearer token",
    });
  });

  it("nested() carries no status or code of its own", () => {
    const { ApiError } = createTypes();

    expect(ApiError.rule("Auth")).toEqual({
      variant: "Auth",
      shape: "unnamed",
      statusCode: undefined,
      code: undefined,
      strategy: "nested",
    });
  });

  it("nested() takes a message template around the inner message", () => {
    const { AuthError } = createTypes();
    const Wrapper = defineErrorType({
      name: "Wrapper",
      variants: { Auth: nested(AuthError, { message: "Auth failed: {0}" }) },
    });

    const err = Wrapper.create({ variant: "Auth", payload: { variant: "MissingToken" } });
    expect(err.message).toBe("Auth failed: Missing bearer token");
    expect(err.toResponseContext().toJSON()).toEqual({
      statusCode: 401,
      code: "AUTHENTICATION_ERROR",
      message: "Missing bearer token",
    });
  });

  it("a custom describe replaces the templates", () => {
    const T = defineErrorType({
      name: "T",
      variants: { A: unit({ message: "template" }) },
      describe: (value) => `custom ${value.variant}`,
    });

    expect(T.create({ variant: "A" }).message).toBe("custom A");
  });

  it("passes the registry through to derivation", async () => {
    const registry = new CustomFnRegistry().register(
      "plainText",
      (ctx) => new Response(`${ctx.code}: ${ctx.message}`, { status: ctx.statusCode ?? 500 }),
    );

    const T = defineErrorType(
      {
        name: "T",
        attributes: { response: { custom_fn: "plainText" } },
        variants: { Gone: unit({ status_code: "410", code: "GONE", message: "It is gone" }) },
      },
      { registry },
    );

    const res = T.intoResponse({ variant: "Gone" });
    expect(res.status).toBe(410);
    expect(await res.text()).toBe("GONE: It is gone");
  });
});

describe("defineErrorType rejection", () => {
  it("rejects a payload placeholder on a unit variant", () => {
    const err = captureDerivationError(() =>
      defineErrorType({ name: "T", variants: { A: unit({ message: "oops {0}" }) } }),
    );
    expect(err.code).toBe("INVALID_MESSAGE");
    expect(err.variant).toBe("A");
  });

  it("rejects a malformed template", () => {
    const err = captureDerivationError(() =>
      defineErrorType({ name: "T", variants: { A: unnamed<string>({ message: "{name}" }) } }),
    );
    expect(err.code).toBe("INVALID_MESSAGE");
    expect(err.message).toBe('T::A: Invalid message template: Unknown placeholder "{name}"');
  });

  it("rejects named variants", () => {
    const err = captureDerivationError(() =>
      defineErrorType({ name: "T", variants: { Record: named(["id"]) } }),
    );
    expect(err.code).toBe("NAMED_FIELDS_UNSUPPORTED");
  });

  it("rejects response: nested on a plain unnamed variant", () => {
    const err = captureDerivationError(() =>
      defineErrorType({
        name: "T",
        variants: { Wrap: unnamed<string>({ response: "nested" }) },
      }),
    );
    expect(err.code).toBe("INVALID_INNER");
  });

  it("rejects malformed attributes", () => {
    const err = captureDerivationError(() =>
      defineErrorType({
        name: "T",
        variants: { A: unit({ status_code: "abc" }) },
      }),
    );
    expect(err.code).toBe("INVALID_STATUS_CODE");
  });
});
