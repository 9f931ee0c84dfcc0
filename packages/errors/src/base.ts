import {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";
import type { SwitchyardErrorOptions } from "./types.js";

/**
 * JSON shape produced by {@link SwitchyardError.toJSON}.
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
  readonly traceId?: string;
  readonly metadata?: Readonly<Record<string, string>>;
}

/**
 * Root of every error raised by Switchyard packages.
 *
 * The `code` selects the catalog entry; HTTP status, gRPC code, domain and
 * base type are derived from it so they can never drift apart. Subclasses
 * narrow `code` with a `declare` field.
 */
export abstract class SwitchyardError extends Error {
  readonly _tag: BaseErrorType;
  readonly code: ErrorCode;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly timestamp: Date;
  readonly traceId: string | undefined;
  readonly metadata: Readonly<Record<string, string>> | undefined;

  protected constructor(code: ErrorCode, message: string, options?: SwitchyardErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    const entry = ERROR_CATALOG[code];
    this.name = new.target.name;
    this._tag = entry.baseType;
    this.code = code;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.timestamp = new Date();
    this.traceId = options?.traceId;
    this.metadata = options?.metadata;
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
      ...(this.traceId !== undefined ? { traceId: this.traceId } : {}),
      ...(this.metadata !== undefined ? { metadata: this.metadata } : {}),
    };
  }
}

/**
 * Check if a value is an Error instance (any realm-local Error)
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}
