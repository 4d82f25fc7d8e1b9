import { InternalError } from "./bases/internal-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

// ---------------------------------------------------------------------------
// Policy mutation argument invalid
// ---------------------------------------------------------------------------

/**
 * Thrown synchronously by a policy mutation when a required argument is
 * missing or empty, or when a list that needs at least one entry is empty.
 */
export class InvalidArgumentError extends ValidationError<"POLICY_INVALID_ARGUMENT"> {
  constructor(
    public readonly argument: string,
    reason: string,
    metadata?: Record<string, string>,
  ) {
    super({
      code: "POLICY_INVALID_ARGUMENT",
      message: `Invalid argument '${argument}': ${reason}`,
      metadata,
      issues: [{ field: argument, message: reason, code: "INVALID_ARGUMENT" }],
    });
  }
}

// ---------------------------------------------------------------------------
// Token construction failed
// ---------------------------------------------------------------------------

/**
 * Thrown when a tag, attribute key, attribute value, protocol or domain
 * token is built from a null, non-string or blank input.
 */
export class InvalidTokenError extends ValidationError<"POLICY_INVALID_TOKEN"> {
  constructor(
    public readonly namespace: string,
    public readonly received: unknown,
  ) {
    super({
      code: "POLICY_INVALID_TOKEN",
      message: `${namespace} must be a non-empty string, got ${describeValue(received)}`,
      issues: [{ field: namespace, message: "must be a non-empty string", code: "EMPTY_TOKEN" }],
    });
  }
}

// ---------------------------------------------------------------------------
// Declarative policy definition invalid
// ---------------------------------------------------------------------------

/**
 * Thrown when a declarative policy definition fails schema validation.
 * Each schema issue is listed as `path: message`.
 */
export class PolicyDefinitionError extends ValidationError<"POLICY_DEFINITION_INVALID"> {
  constructor(
    public readonly schemaIssues: readonly ValidationIssue[],
    cause?: Error,
  ) {
    super({
      code: "POLICY_DEFINITION_INVALID",
      message: `Policy definition is invalid:\n${schemaIssues
        .map((i) => `  - ${i.field || "(root)"}: ${i.message}`)
        .join("\n")}`,
      issues: schemaIssues,
      ...(cause ? { cause } : {}),
    });
  }
}

// ---------------------------------------------------------------------------
// Policy files
// ---------------------------------------------------------------------------

export class PolicyFileNotFoundError extends NotFoundError<"POLICY_FILE_NOT_FOUND"> {
  constructor(
    public readonly filePath: string,
    metadata?: Record<string, string>,
  ) {
    super({
      code: "POLICY_FILE_NOT_FOUND",
      message: `Policy file not found: ${filePath}`,
      metadata,
    });
  }
}

/** YAML syntax error in a policy file, with its position when known */
export class PolicyParseError extends ValidationError<"POLICY_PARSE_FAILED"> {
  constructor(
    public readonly filePath: string | undefined,
    message: string,
    public readonly line?: number | undefined,
    public readonly column?: number | undefined,
    cause?: Error,
  ) {
    const location =
      line !== undefined ? ` at line ${line}${column !== undefined ? `:${column}` : ""}` : "";
    super({
      code: "POLICY_PARSE_FAILED",
      message: `Policy parse failed${filePath ? ` (${filePath})` : ""}${location}: ${message}`,
      ...(cause ? { cause } : {}),
    });
  }
}

// ---------------------------------------------------------------------------
// Bundled preset table broken
// ---------------------------------------------------------------------------

/**
 * Thrown when the preset table shipped with the package does not load.
 */
export class PresetLoadError extends InternalError<"POLICY_PRESET_INVALID"> {
  constructor(
    public readonly preset: string,
    cause?: Error,
  ) {
    super({
      code: "POLICY_PRESET_INVALID",
      message: `Bundled preset '${preset}' could not be loaded${cause ? `: ${cause.message}` : ""}`,
      ...(cause ? { cause } : {}),
    });
  }
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") return value.length === 0 ? "empty string" : "blank string";
  return typeof value;
}
