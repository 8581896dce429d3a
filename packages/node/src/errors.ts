/**
 * @errmap/node — Error types of the example service.
 *
 * Every failure a route can produce is a variant of ApiError. Authentication
 * failures live in their own type and surface through the nested Auth
 * variant, so their status and code come from AuthError.
 */

import { defineErrorType, nested, unit, unnamed } from "@errmap/derive";
import type { DerivedError, ValueOf } from "@errmap/derive";

// =============================================================================
// AuthError
// =============================================================================

const authVariants = {
  MissingToken: unit({
    status_code: "401",
    code: "AUTHENTICATION_ERROR",
    message: "Authentication required",
  }),
  InvalidToken: unit({
    status_code: "401",
    code: "AUTHENTICATION_ERROR",
    message: "Invalid token",
  }),
};

export const AuthError = defineErrorType({ name: "AuthError", variants: authVariants });

export type AuthErrorValue = ValueOf<typeof authVariants>;

// =============================================================================
// ApiError
// =============================================================================

const apiVariants = {
  BadRequest: unnamed<string>({
    status_code: "400",
    code: "BAD_REQUEST",
    message: "Bad request: {0}",
  }),
  ValidationFailed: unnamed<string>({
    status_code: "400",
    code: "VALIDATION_ERROR",
    message: "Validation failed: {0}",
  }),
  AccountNotFound: unnamed<string>({
    status_code: "404",
    code: "NOT_FOUND",
    message: "Account {0} not found",
  }),
  RouteNotFound: unnamed<string>({
    status_code: "404",
    code: "NOT_FOUND",
    message: "No route for {0}",
  }),
  AccountExists: unnamed<string>({
    status_code: "409",
    code: "CONFLICT",
    message: "Account {0} already exists",
  }),
  InsufficientFunds: unnamed<string>({
    status_code: "422",
    code: "INSUFFICIENT_FUNDS",
    message: "Insufficient funds in account {0}",
  }),
  BalanceLimitExceeded: unnamed<string>({
    status_code: "422",
    code: "BALANCE_LIMIT_EXCEEDED",
    message: "Deposit would exceed the balance limit of account {0}",
  }),
  Auth: nested(AuthError),
  Internal: unit(),
};

export const ApiError = defineErrorType({ name: "ApiError", variants: apiVariants });

export type ApiErrorValue = ValueOf<typeof apiVariants>;

/** Shorthand for raising an authentication failure through ApiError. */
export function authFailure(variant: AuthErrorValue["variant"]): DerivedError<ApiErrorValue> {
  return ApiError.create({ variant: "Auth", payload: AuthError.create({ variant }) });
}
