/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the bridge maps to an HTTP status, a gRPC
 * canonical code, and one of the behavioral base error types.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, validation, a2a
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "PermissionError"
  | "TimeoutError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL",
    baseType: "InternalError",
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },
  INTERNAL_UNAVAILABLE: {
    domain: "internal",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: false,
    title: "Service unavailable",
    description: "A dependency is temporarily unavailable",
  },
  INTERNAL_TIMEOUT: {
    domain: "internal",
    httpStatus: 504,
    grpcCode: "DEADLINE_EXCEEDED",
    baseType: "TimeoutError",
    isExpected: false,
    title: "Operation timed out",
    description: "The operation exceeded its deadline",
  },

  // ============================================================================
  // VALIDATION ERRORS - Bad input or configuration
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT",
    baseType: "ValidationError",
    isExpected: true,
    title: "Validation failed",
    description: "Input failed validation",
  },

  // ============================================================================
  // A2A ERRORS - Remote agent client
  // ============================================================================
  A2A_CONFIG_INVALID: {
    domain: "a2a",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid A2A client configuration",
    description: "The provider options could not be validated",
  },
  A2A_CLIENT_INIT_FAILED: {
    domain: "a2a",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: false,
    title: "A2A client initialization failed",
    description: "The HTTP transport for an agent URL could not be created",
  },
  A2A_DISCOVERY_FAILED: {
    domain: "a2a",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: true,
    title: "A2A agent discovery failed",
    description: "The agent card could not be fetched or parsed",
  },
  A2A_SEND_FAILED: {
    domain: "a2a",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: true,
    title: "A2A message send failed",
    description: "The message could not be delivered or produced no response",
  },
  A2A_AUTH_FAILED: {
    domain: "a2a",
    httpStatus: 401,
    grpcCode: "UNAUTHENTICATED",
    baseType: "PermissionError",
    isExpected: true,
    title: "A2A authentication failed",
    description: "The remote agent rejected the configured credentials",
  },
  A2A_TRANSPORT_TIMEOUT: {
    domain: "a2a",
    httpStatus: 504,
    grpcCode: "DEADLINE_EXCEEDED",
    baseType: "TimeoutError",
    isExpected: true,
    title: "A2A request timed out",
    description: "An HTTP request to a remote agent exceeded the configured timeout",
  },
  A2A_TRANSPORT_CLOSED: {
    domain: "a2a",
    httpStatus: 500,
    grpcCode: "FAILED_PRECONDITION",
    baseType: "InternalError",
    isExpected: false,
    title: "A2A transport closed",
    description: "A request was issued on a transport client that was already closed",
  },
  A2A_TRANSPORT_HTTP_ERROR: {
    domain: "a2a",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: true,
    title: "A2A HTTP error",
    description: "A remote agent answered with a non-success HTTP status",
  },
  A2A_TRANSPORT_REQUEST_FAILED: {
    domain: "a2a",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: true,
    title: "A2A request failed",
    description: "The HTTP request to a remote agent failed before a response arrived",
  },
} as const satisfies Record<string, CatalogEntryShape>;

interface CatalogEntryShape {
  readonly domain: string;
  readonly httpStatus: number;
  readonly grpcCode: string;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly title: string;
  readonly description: string;
}

/** All error codes in the catalog */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/** Shape of a single catalog entry */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

export type ErrorDomain = ErrorCatalogEntry["domain"];

export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Error codes whose catalog entry maps to the given base type.
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
