/**
 * YAML policy files. Parses with `yaml`, then validates through
 * {@link parsePolicyDefinition}.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import { PolicyFileNotFoundError, PolicyParseError } from "@tagwarden/errors";
import { parse as parseYaml, YAMLParseError } from "yaml";

import { parsePolicyDefinition } from "./parser.js";
import type { PolicyDefinition } from "./schema.js";

export interface LoadPolicyOptions {
  readonly encoding?: BufferEncoding;
}

/**
 * Parse a YAML document into a validated policy definition.
 *
 * @param filePath - only used in error messages
 */
export function parsePolicyYaml(yamlString: string, filePath?: string): PolicyDefinition {
  let parsed: unknown;
  try {
    parsed = parseYaml(yamlString);
  } catch (error: unknown) {
    if (error instanceof YAMLParseError) {
      const pos = error.linePos?.[0];
      throw new PolicyParseError(filePath, error.message, pos?.line, pos?.col, error);
    }
    throw new PolicyParseError(filePath, String(error));
  }
  return parsePolicyDefinition(parsed);
}

/** Read a YAML policy file from disk and validate it */
export async function loadPolicyDefinition(
  filePath: string,
  options?: LoadPolicyOptions,
): Promise<PolicyDefinition> {
  const absolutePath = resolve(filePath);

  let content: string;
  try {
    content = await readFile(absolutePath, { encoding: options?.encoding ?? "utf-8" });
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      throw new PolicyFileNotFoundError(absolutePath);
    }
    throw error;
  }

  return parsePolicyYaml(content, absolutePath);
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
