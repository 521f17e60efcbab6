/**
 * A2A errors for the remote agent client
 *
 * Abstract base: A2aError
 * Concrete:
 *   - ProviderConfigError     (A2A_CONFIG_INVALID)
 *   - ClientInitError         (A2A_CLIENT_INIT_FAILED)
 *   - DiscoveryError          (A2A_DISCOVERY_FAILED)
 *   - SendError               (A2A_SEND_FAILED)
 *   - A2aAuthFailedError      (A2A_AUTH_FAILED)
 *   - TransportTimeoutError   (A2A_TRANSPORT_TIMEOUT)
 *   - TransportClosedError    (A2A_TRANSPORT_CLOSED)
 *   - TransportHttpError      (A2A_TRANSPORT_HTTP_ERROR)
 *   - TransportRequestError   (A2A_TRANSPORT_REQUEST_FAILED)
 */

import { BridgeError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain, type GrpcStatusCode, type HttpStatusCode } from "./catalog.js";
import type { ValidationIssue } from "./types.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

export abstract class A2aError extends BridgeError {}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export class ProviderConfigError extends A2aError {
  readonly _tag = "ValidationError" as const;
  readonly code = "A2A_CONFIG_INVALID" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.A2A_CONFIG_INVALID.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.A2A_CONFIG_INVALID.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.A2A_CONFIG_INVALID.domain;
  readonly isExpected: boolean = ERROR_CATALOG.A2A_CONFIG_INVALID.isExpected;
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(`Invalid A2A client configuration: ${message}`);
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Client lifecycle, discovery and messaging
// ---------------------------------------------------------------------------

export class ClientInitError extends A2aError {
  readonly _tag = "ExternalError" as const;
  readonly code = "A2A_CLIENT_INIT_FAILED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.A2A_CLIENT_INIT_FAILED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.A2A_CLIENT_INIT_FAILED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.A2A_CLIENT_INIT_FAILED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.A2A_CLIENT_INIT_FAILED.isExpected;
  readonly agentUrl: string;

  constructor(agentUrl: string, cause: unknown) {
    super(
      `Failed to initialize A2A client for "${agentUrl}": ${describeCause(cause)}`,
      undefined,
      undefined,
      { cause },
    );
    this.agentUrl = agentUrl;
  }
}

export class DiscoveryError extends A2aError {
  readonly _tag = "ExternalError" as const;
  readonly code = "A2A_DISCOVERY_FAILED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.A2A_DISCOVERY_FAILED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.A2A_DISCOVERY_FAILED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.A2A_DISCOVERY_FAILED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.A2A_DISCOVERY_FAILED.isExpected;
  readonly agentUrl: string;

  constructor(agentUrl: string, cause: unknown) {
    super(
      `A2A discovery failed for "${agentUrl}": ${describeCause(cause)}`,
      undefined,
      undefined,
      { cause },
    );
    this.agentUrl = agentUrl;
  }
}

export class SendError extends A2aError {
  readonly _tag = "ExternalError" as const;
  readonly code = "A2A_SEND_FAILED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.A2A_SEND_FAILED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.A2A_SEND_FAILED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.A2A_SEND_FAILED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.A2A_SEND_FAILED.isExpected;
  readonly agentUrl: string;
  readonly messageId: string;

  constructor(agentUrl: string, messageId: string, cause: unknown) {
    super(
      `A2A send failed for "${agentUrl}" (message: ${messageId}): ${describeCause(cause)}`,
      undefined,
      undefined,
      { cause },
    );
    this.agentUrl = agentUrl;
    this.messageId = messageId;
  }
}

export class A2aAuthFailedError extends A2aError {
  readonly _tag = "PermissionError" as const;
  readonly code = "A2A_AUTH_FAILED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.A2A_AUTH_FAILED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.A2A_AUTH_FAILED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.A2A_AUTH_FAILED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.A2A_AUTH_FAILED.isExpected;
  readonly agentUrl: string;
  readonly status: number;

  constructor(agentUrl: string, status: number) {
    super(`A2A authentication failed for "${agentUrl}": HTTP ${status}`);
    this.agentUrl = agentUrl;
    this.status = status;
  }
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export class TransportTimeoutError extends A2aError {
  readonly _tag = "TimeoutError" as const;
  readonly code = "A2A_TRANSPORT_TIMEOUT" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.A2A_TRANSPORT_TIMEOUT.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.A2A_TRANSPORT_TIMEOUT.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.A2A_TRANSPORT_TIMEOUT.domain;
  readonly isExpected: boolean = ERROR_CATALOG.A2A_TRANSPORT_TIMEOUT.isExpected;
  readonly target: string;
  readonly timeoutMs: number;

  constructor(target: string, timeoutMs: number) {
    super(`A2A request to "${target}" timed out after ${timeoutMs}ms`);
    this.target = target;
    this.timeoutMs = timeoutMs;
  }
}

export class TransportClosedError extends A2aError {
  readonly _tag = "InternalError" as const;
  readonly code = "A2A_TRANSPORT_CLOSED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.A2A_TRANSPORT_CLOSED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.A2A_TRANSPORT_CLOSED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.A2A_TRANSPORT_CLOSED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.A2A_TRANSPORT_CLOSED.isExpected;
  readonly agentUrl: string;

  constructor(agentUrl: string) {
    super(`A2A transport for "${agentUrl}" is closed`);
    this.agentUrl = agentUrl;
  }
}

export class TransportHttpError extends A2aError {
  readonly _tag = "ExternalError" as const;
  readonly code = "A2A_TRANSPORT_HTTP_ERROR" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.A2A_TRANSPORT_HTTP_ERROR.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.A2A_TRANSPORT_HTTP_ERROR.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.A2A_TRANSPORT_HTTP_ERROR.domain;
  readonly isExpected: boolean = ERROR_CATALOG.A2A_TRANSPORT_HTTP_ERROR.isExpected;
  readonly target: string;
  readonly status: number;
  readonly body: string;

  constructor(target: string, status: number, body: string) {
    super(`HTTP ${status} from "${target}"${body ? `: ${body}` : ""}`);
    this.target = target;
    this.status = status;
    this.body = body;
  }
}

export class TransportRequestError extends A2aError {
  readonly _tag = "ExternalError" as const;
  readonly code = "A2A_TRANSPORT_REQUEST_FAILED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.A2A_TRANSPORT_REQUEST_FAILED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.A2A_TRANSPORT_REQUEST_FAILED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.A2A_TRANSPORT_REQUEST_FAILED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.A2A_TRANSPORT_REQUEST_FAILED.isExpected;
  readonly target: string;

  constructor(target: string, cause: unknown) {
    super(`A2A request to "${target}" failed: ${describeCause(cause)}`, undefined, undefined, {
      cause,
    });
    this.target = target;
  }
}
