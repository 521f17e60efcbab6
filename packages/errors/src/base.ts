import type {
  BaseErrorType,
  ErrorCode,
  ErrorDomain,
  GrpcStatusCode,
  HttpStatusCode,
} from "./catalog.js";

/**
 * JSON form of a BridgeError, as produced by `toJSON()`.
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Record<string, string> | undefined;
  readonly traceId?: string | undefined;
  readonly cause?: string | undefined;
}

/**
 * Root of the error hierarchy.
 *
 * Subclasses fill in `_tag`, `code` and the catalog-derived fields.
 */
export abstract class BridgeError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly grpcCode: GrpcStatusCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly timestamp: Date;
  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
    this.metadata = metadata;
    this.traceId = traceId;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      metadata: this.metadata,
      traceId: this.traceId,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

/** Check if a value is a BridgeError */
export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}

/** Check if a value is any Error */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
