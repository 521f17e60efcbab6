import { BridgeError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain, type GrpcStatusCode, type HttpStatusCode } from "../catalog.js";
import type { BridgeErrorOptions } from "../types.js";

/**
 * Errors caused by bugs or by values that are not errors at all.
 * HTTP 500.
 */
export class InternalError extends BridgeError {
  readonly _tag = "InternalError" as const;
  readonly code = "INTERNAL_ERROR" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.INTERNAL_ERROR.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.INTERNAL_ERROR.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.INTERNAL_ERROR.domain;
  readonly isExpected: boolean = ERROR_CATALOG.INTERNAL_ERROR.isExpected;

  constructor(options: BridgeErrorOptions);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | BridgeErrorOptions,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    if (typeof messageOrOptions === "string") {
      super(messageOrOptions, metadata, traceId);
    } else {
      const opts = messageOrOptions;
      super(
        opts.message,
        opts.metadata,
        opts.traceId,
        opts.cause !== undefined ? { cause: opts.cause } : undefined,
      );
    }
  }
}
