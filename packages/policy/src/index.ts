// Constants
export {
  ANCHOR_PROTOCOL,
  HREF_ATTRIBUTE,
  PACKAGE_NAME,
  SRC_ATTRIBUTE,
  WILDCARD_TAG,
} from "./constants.js";

// Core
export { PolicyBuilder } from "./builder.js";
export { Policy } from "./policy.js";

// Presets
export {
  basicPreset,
  basicWithImagesPreset,
  nonePreset,
  presetBuilder,
  relaxedPreset,
  simpleTextPreset,
} from "./presets.js";

// Definitions
export { parsePolicyDefinition, policyFromDefinition } from "./definition/parser.js";
export { type LoadPolicyOptions, loadPolicyDefinition, parsePolicyYaml } from "./definition/loader.js";
export {
  PRESET_NAMES,
  PolicyDefinitionSchema,
  PresetNameSchema,
} from "./definition/schema.js";
export type { PolicyDefinition, PresetName } from "./definition/schema.js";

// Tokens
export {
  toAttributeKey,
  toAttributeValue,
  toDomain,
  toProtocol,
  toTagName,
} from "./tokens.js";
export type {
  AttributeKey,
  AttributeValue,
  Domain,
  Protocol,
  TagName,
  TokenNamespace,
} from "./tokens.js";

// URL helpers
export { isValidAnchor } from "./url.js";

// Types
export type { NestedRegistry, PolicyBuilderOptions, PolicyElement, PolicyState } from "./types.js";
