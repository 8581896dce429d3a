/**
 * Tests for authentication middleware.
 *
 * Verifies:
 * - Bearer token auth (valid, invalid, missing)
 * - Failures render AuthError's status and code through ApiError.Auth
 * - Routes outside /api stay public
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, TEST_TOKEN } from "../setup.js";
import type { ErrorBody } from "../setup.js";

function makeApp() {
  return createTestApp({ auth: { tokens: new Set([TEST_TOKEN]) } }).app;
}

describe("authMiddleware", () => {
  it("accepts a configured bearer token", async () => {
    const res = await makeApp().request(
      jsonRequest("/api/v1/accounts", "GET", undefined, {
        Authorization: `Bearer ${TEST_TOKEN}`,
      }),
    );

    expect(res.status).toBe(200);
  });

  it("rejects a request without a token", async () => {
    const res = await makeApp().request("/api/v1/accounts");

    expect(res.status).toBe(401);
    expect((await res.json()) as ErrorBody).toEqual({
      result: null,
      error: { code: "AUTHENTICATION_ERROR", message: "Authentication required" },
    });
  });

  it("rejects a non-bearer Authorization header", async () => {
    const res = await makeApp().request(
      jsonRequest("/api/v1/accounts", "GET", undefined, { Authorization: "Basic dGVzdA==" }),
    );

    expect(res.status).toBe(401);
    expect(((await res.json()) as ErrorBody).error.message).toBe("Authentication required");
  });

  it("rejects an unknown token", async () => {
    const res = await makeApp().request(
      jsonRequest("/api/v1/accounts", "GET", undefined, { Authorization: "Bearer wrong-token" }),
    );

    expect(res.status).toBe(401);
    expect((await res.json()) as ErrorBody).toEqual({
      result: null,
      error: { code: "AUTHENTICATION_ERROR", message: "Invalid token" },
    });
  });

  it("leaves /health public", async () => {
    const res = await makeApp().request("/health");
    expect(res.status).toBe(200);
  });
});
