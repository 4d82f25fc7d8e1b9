import type { ErrorCode, ErrorDomain, GrpcStatusCode, HttpStatusCode } from "./catalog.js";

/**
 * JSON shape produced by {@link TagwardenError.toJSON}
 */
export interface ErrorJSON {
  readonly _tag: string;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Record<string, string> | undefined;
  readonly traceId?: string | undefined;
  readonly stack?: string | undefined;
}

/**
 * Root of the error hierarchy.
 *
 * Concrete base types fill in `code` and the catalog-derived fields;
 * `_tag` discriminates the class for exhaustive matching.
 */
export abstract class TagwardenError extends Error {
  abstract readonly _tag: string;
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
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
    this.metadata = metadata;
    this.traceId = traceId;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace?.(this, new.target);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      metadata: this.metadata,
      traceId: this.traceId,
      stack: this.stack,
    };
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.metadata && Object.keys(this.metadata).length > 0) {
      str += ` ${JSON.stringify(this.metadata)}`;
    }
    if (this.traceId) {
      str += ` [trace: ${this.traceId}]`;
    }
    return str;
  }
}

/**
 * Check if a value is an Error instance
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * Check if a value is a TagwardenError instance
 */
export function isTagwardenError(value: unknown): value is TagwardenError {
  return value instanceof TagwardenError;
}
