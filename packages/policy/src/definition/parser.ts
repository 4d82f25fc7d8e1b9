import { PolicyDefinitionError, type ValidationIssue } from "@tagwarden/errors";
import { PolicyBuilder } from "../builder.js";
import { presetBuilder } from "../presets.js";
import type { PolicyBuilderOptions } from "../types.js";
import { applyDefinition } from "./apply.js";
import { type PolicyDefinition, PolicyDefinitionSchema } from "./schema.js";

/**
 * Validate an untrusted value (typically parsed JSON or YAML) as a policy
 * definition. Throws {@link PolicyDefinitionError} listing every issue.
 */
export function parsePolicyDefinition(input: unknown): PolicyDefinition {
  const result = PolicyDefinitionSchema.safeParse(input);
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));
    throw new PolicyDefinitionError(issues, result.error);
  }
  return result.data;
}

/**
 * Build a policy builder from a definition: start from the preset named by
 * `extends` (or an empty builder) and replay the definition on top.
 */
export function policyFromDefinition(
  input: unknown,
  options?: PolicyBuilderOptions,
): PolicyBuilder {
  const definition = parsePolicyDefinition(input);
  const builder = definition.extends
    ? presetBuilder(definition.extends, options)
    : new PolicyBuilder(options);
  return applyDefinition(builder, definition);
}
