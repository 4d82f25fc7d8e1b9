import { TagwardenError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";
import { ERROR_CATALOG, type ErrorCatalogEntry, type ErrorCode } from "./catalog.js";

/**
 * Look up error catalog entry by code
 */
export function getCatalogEntry(code: ErrorCode): ErrorCatalogEntry {
  return ERROR_CATALOG[code];
}

/**
 * Check if a string is a valid error code
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return code in ERROR_CATALOG;
}

/**
 * Get all error codes in the catalog
 */
export function getAllErrorCodes(): ErrorCode[] {
  return Object.keys(ERROR_CATALOG).filter(isValidErrorCode);
}

/**
 * Get all error codes for a specific domain
 */
export function getErrorCodesByDomain(domain: string): ErrorCode[] {
  return getAllErrorCodes().filter((code) => ERROR_CATALOG[code].domain === domain);
}

/**
 * Wrap an unknown error into a TagwardenError.
 * If the error is already a TagwardenError, return it as-is.
 * Otherwise, wrap it in an InternalError.
 */
export function wrapError(error: unknown, traceId?: string): TagwardenError {
  if (error instanceof TagwardenError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, { originalName: error.name }, traceId);
  }

  const message = typeof error === "string" ? error : "An unknown error occurred";
  return new InternalError(message, undefined, traceId);
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * Validate catalog consistency (for tests)
 * Checks:
 * - All codes are UPPER_SNAKE_CASE
 * - All HTTP status codes are valid (100-599)
 * - Codes are prefixed with their upper-cased domain
 */
export function validateCatalog(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (const [code, entry] of Object.entries(ERROR_CATALOG)) {
    if (!/^[A-Z][A-Z0-9_]*$/.test(code)) {
      errors.push(`Code '${code}' is not in UPPER_SNAKE_CASE format`);
    }

    if (entry.httpStatus < 100 || entry.httpStatus >= 600) {
      errors.push(`Code '${code}' has invalid HTTP status ${entry.httpStatus}`);
    }

    if (!code.startsWith(`${entry.domain.toUpperCase()}_`)) {
      errors.push(`Code '${code}' is not prefixed with its domain '${entry.domain}'`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
