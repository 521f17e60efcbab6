import { BridgeError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain, type GrpcStatusCode, type HttpStatusCode } from "../catalog.js";
import type { BridgeErrorOptions, ValidationIssue } from "../types.js";

/**
 * Errors caused by invalid input or tool arguments.
 * HTTP 400-class. Carries field-level issues when available.
 */
export class ValidationError extends BridgeError {
  readonly _tag = "ValidationError" as const;
  readonly code = "VALIDATION_FAILED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.VALIDATION_FAILED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.VALIDATION_FAILED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.VALIDATION_FAILED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.VALIDATION_FAILED.isExpected;

  /** Structured validation issues */
  readonly issues: readonly ValidationIssue[];

  constructor(options: BridgeErrorOptions & { issues?: readonly ValidationIssue[] });
  constructor(
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  );
  constructor(
    messageOrOptions: string | (BridgeErrorOptions & { issues?: readonly ValidationIssue[] }),
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    if (typeof messageOrOptions === "string") {
      super(messageOrOptions, metadata, traceId);
      this.issues = issues ?? [];
    } else {
      const opts = messageOrOptions;
      super(
        opts.message,
        opts.metadata,
        opts.traceId,
        opts.cause !== undefined ? { cause: opts.cause } : undefined,
      );
      this.issues = opts.issues ?? [];
    }
  }
}
