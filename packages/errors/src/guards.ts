/**
 * Type guards for base error categories + code-level discrimination.
 */

import { type BridgeError, isBridgeError } from "./base.js";
import type { BaseErrorType, ErrorCode } from "./catalog.js";

function hasTag(error: unknown, tag: BaseErrorType): error is BridgeError {
  return isBridgeError(error) && error._tag === tag;
}

/** Check if an error is tagged ValidationError (bad input, config) */
export function isValidationError(error: unknown): error is BridgeError {
  return hasTag(error, "ValidationError");
}

/** Check if an error is tagged PermissionError (auth failure) */
export function isPermissionError(error: unknown): error is BridgeError {
  return hasTag(error, "PermissionError");
}

/** Check if an error is tagged TimeoutError (deadline exceeded) */
export function isTimeoutError(error: unknown): error is BridgeError {
  return hasTag(error, "TimeoutError");
}

/** Check if an error is tagged ExternalError (dependency/runtime failure) */
export function isExternalError(error: unknown): error is BridgeError {
  return hasTag(error, "ExternalError");
}

/**
 * Check if a BridgeError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: BridgeError,
  code: C,
): error is BridgeError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (4xx-class or a known
 * remote failure). Returns false for non-BridgeError values.
 */
export function isExpectedError(error: unknown): boolean {
  return isBridgeError(error) && error.isExpected;
}
