import { TagwardenError } from "../base.js";
import {
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "../catalog.js";
import type { TagwardenErrorOptions } from "../types.js";

type InternalCode = CodesForBase<"InternalError">;

/**
 * Errors caused by bugs or broken packaging.
 * HTTP 500. The `.code` field discriminates the specific error.
 */
export class InternalError<C extends InternalCode = "INTERNAL_ERROR"> extends TagwardenError {
  readonly _tag = "InternalError" as const;
  override readonly code: C;
  override readonly httpStatus: HttpStatusCode;
  override readonly grpcCode: GrpcStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: TagwardenErrorOptions<C>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | TagwardenErrorOptions<C>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    if (typeof messageOrOptions === "string") {
      super(messageOrOptions, metadata, traceId);
      const code = "INTERNAL_ERROR" as C;
      const entry = ERROR_CATALOG[code];
      this.code = code;
      this.httpStatus = entry.httpStatus as HttpStatusCode;
      this.grpcCode = entry.grpcCode as GrpcStatusCode;
      this.domain = entry.domain as ErrorDomain;
      this.isExpected = entry.isExpected;
    } else {
      const opts = messageOrOptions;
      super(opts.message, opts.metadata, opts.traceId, opts.cause ? { cause: opts.cause } : undefined);
      const entry = ERROR_CATALOG[opts.code];
      this.code = opts.code;
      this.httpStatus = entry.httpStatus as HttpStatusCode;
      this.grpcCode = entry.grpcCode as GrpcStatusCode;
      this.domain = entry.domain as ErrorDomain;
      this.isExpected = entry.isExpected;
    }
  }
}
