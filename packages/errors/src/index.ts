/**
 * @a2a-bridge/errors
 *
 * Shared error taxonomy for the A2A tool bridge.
 *
 * Each error carries a `.code` from the catalog that discriminates the
 * specific condition, and a `_tag` naming its behavioral base type. Use
 * `error.code === "XXX"` for fine-grained matching, or the guards for
 * category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { BridgeError, type ErrorJSON, isBridgeError, isError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export { getCatalogEntry, getErrorMessage, isValidErrorCode, wrapError } from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { InternalError, ValidationError } from "./bases/index.js";

export type {
  BridgeErrorOptions,
  ExternalCodes,
  InternalCodes,
  PermissionCodes,
  TimeoutCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isExpectedError,
  isExternalError,
  isPermissionError,
  isTimeoutError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// A2A ERRORS
// ============================================================================

export {
  A2aAuthFailedError,
  A2aError,
  ClientInitError,
  DiscoveryError,
  ProviderConfigError,
  SendError,
  TransportClosedError,
  TransportHttpError,
  TransportRequestError,
  TransportTimeoutError,
} from "./a2a.js";
