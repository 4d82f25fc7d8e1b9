/**
 * Zod schema for declarative policy definitions — the JSON-compatible form
 * of a PolicyBuilder's registries. Bundled presets use the same format.
 */

import { z } from "zod";

export const PRESET_NAMES = ["none", "simpleText", "basic", "basicWithImages", "relaxed"] as const;

export const PresetNameSchema = z.enum(PRESET_NAMES);

const TokenSchema = z
  .string()
  .refine((value) => value.trim().length > 0, { message: "Must be a non-empty string" });

const TokenListSchema = z.array(TokenSchema).min(1);

/** tag → attribute → values */
const NestedTokenListSchema = z.record(TokenSchema, z.record(TokenSchema, TokenListSchema));

export const PolicyDefinitionSchema = z
  .object({
    extends: PresetNameSchema.optional(),
    tags: z.array(TokenSchema).optional(),
    attributes: z.record(TokenSchema, TokenListSchema).optional(),
    enforcedAttributes: z.record(TokenSchema, z.record(TokenSchema, TokenSchema)).optional(),
    protocols: NestedTokenListSchema.optional(),
    domains: NestedTokenListSchema.optional(),
    preserveRelativeLinks: z.boolean().optional(),
  })
  .strict();

export const PresetTableSchema = z
  .object({
    none: PolicyDefinitionSchema,
    simpleText: PolicyDefinitionSchema,
    basic: PolicyDefinitionSchema,
    basicWithImages: PolicyDefinitionSchema,
    relaxed: PolicyDefinitionSchema,
  })
  .strict();

export type PresetName = z.infer<typeof PresetNameSchema>;
export type PolicyDefinition = z.infer<typeof PolicyDefinitionSchema>;
export type PresetTable = z.infer<typeof PresetTableSchema>;
