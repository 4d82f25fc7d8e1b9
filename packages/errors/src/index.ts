/**
 * @tagwarden/errors
 *
 * Shared error taxonomy for the tagwarden policy engine.
 *
 * Every error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` for fine-grained matching,
 * or `instanceof BaseType` for category matching.
 */

export const PACKAGE_NAME = "@tagwarden/errors" as const;

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, isTagwardenError, TagwardenError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  validateCatalog,
  wrapError,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { InternalError, NotFoundError, ValidationError } from "./bases/index.js";

export type {
  InternalCodes,
  NotFoundCodes,
  TagwardenErrorOptions,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isExpectedError,
  isInternalError,
  isNotFoundError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// POLICY ERRORS
// ============================================================================

export {
  InvalidArgumentError,
  InvalidTokenError,
  PolicyDefinitionError,
  PolicyFileNotFoundError,
  PolicyParseError,
  PresetLoadError,
} from "./policy.js";
