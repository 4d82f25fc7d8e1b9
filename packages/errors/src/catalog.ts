/**
 * Error Catalog - Single Source of Truth
 *
 * Each error code maps to an HTTP status code, a gRPC canonical code, and a
 * base error type.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: INTERNAL, VALIDATION, RESOURCE, POLICY
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "NotFoundError" | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal server error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // VALIDATION ERRORS - Generic input validation
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Validation failed",
    description: "The supplied input failed validation",
  },

  // ============================================================================
  // RESOURCE ERRORS - Generic lookups
  // ============================================================================
  RESOURCE_NOT_FOUND: {
    domain: "resource",
    httpStatus: 404,
    grpcCode: "NOT_FOUND" as const,
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Resource not found",
    description: "The requested resource does not exist",
  },

  // ============================================================================
  // POLICY ERRORS - Allow-list policy configuration
  // ============================================================================
  POLICY_INVALID_ARGUMENT: {
    domain: "policy",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid policy argument",
    description: "A policy mutation was called with a missing or empty argument",
  },
  POLICY_INVALID_TOKEN: {
    domain: "policy",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid policy token",
    description: "A tag, attribute, value, protocol or domain token was null or empty",
  },
  POLICY_DEFINITION_INVALID: {
    domain: "policy",
    httpStatus: 422,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid policy definition",
    description: "The declarative policy definition does not match the schema",
  },
  POLICY_PARSE_FAILED: {
    domain: "policy",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Policy file parse failed",
    description: "The policy file contains invalid YAML syntax",
  },
  POLICY_FILE_NOT_FOUND: {
    domain: "policy",
    httpStatus: 404,
    grpcCode: "NOT_FOUND" as const,
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Policy file not found",
    description: "The policy definition file does not exist",
  },
  POLICY_PRESET_INVALID: {
    domain: "policy",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Invalid bundled preset",
    description: "The bundled preset table could not be loaded",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * gRPC canonical status codes used in the catalog
 */
export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
