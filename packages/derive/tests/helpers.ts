/**
 * Shared fixtures for @errmap/derive tests.
 */

import { deriveErrorType } from "../src/derive.js";
import { DerivationError } from "../src/errors.js";
import type { ErrorTypeDescription, ErrorValue } from "../src/types.js";

export type AuthValue =
  | { readonly variant: "InvalidToken" }
  | { readonly variant: "Expired"; readonly payload: string };

export const authDescription: ErrorTypeDescription<AuthValue> = {
  name: "AuthError",
  variants: [
    {
      name: "InvalidToken",
      fields: { kind: "unit" },
      attributes: { status_code: "401", code: "AUTHENTICATION_ERROR" },
    },
    {
      name: "Expired",
      fields: { kind: "unnamed" },
      attributes: { status_code: "401", code: "TOKEN_EXPIRED" },
    },
  ],
  describe: (value) => {
    switch (value.variant) {
      case "InvalidToken":
        return "Invalid token";
      case "Expired":
        return `Token expired at ${value.payload}`;
    }
  },
};

export function createAuthError() {
  return deriveErrorType(authDescription);
}

/**
 * Run `fn` and return the DerivationError it throws.
 * Fails the test if it throws anything else or nothing at all.
 */
export function captureDerivationError(fn: () => unknown): DerivationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof DerivationError) {
      return err;
    }
    throw err;
  }
  throw new Error("Expected derivation to fail, but it succeeded");
}

export function describeByVariant(value: ErrorValue): string {
  return value.payload === undefined ? value.variant : `${value.variant}: ${String(value.payload)}`;
}
