import type { PolicyBuilder } from "../builder.js";
import type { PolicyDefinition } from "./schema.js";

/**
 * Replay a validated definition onto a builder: tags, attributes, enforced
 * attributes, protocols, domains, then the relative-links flag. `extends`
 * is resolved by the caller.
 */
export function applyDefinition(builder: PolicyBuilder, definition: PolicyDefinition): PolicyBuilder {
  if (definition.tags && definition.tags.length > 0) {
    builder.addTags(...definition.tags);
  }
  for (const [tag, keys] of Object.entries(definition.attributes ?? {})) {
    builder.addAttributes(tag, ...keys);
  }
  for (const [tag, pairs] of Object.entries(definition.enforcedAttributes ?? {})) {
    for (const [key, value] of Object.entries(pairs)) {
      builder.addEnforcedAttribute(tag, key, value);
    }
  }
  for (const [tag, byKey] of Object.entries(definition.protocols ?? {})) {
    for (const [key, protocols] of Object.entries(byKey)) {
      builder.addProtocols(tag, key, ...protocols);
    }
  }
  for (const [tag, byKey] of Object.entries(definition.domains ?? {})) {
    for (const [key, domains] of Object.entries(byKey)) {
      builder.addDomains(tag, key, ...domains);
    }
  }
  if (definition.preserveRelativeLinks !== undefined) {
    builder.preserveRelativeLinks(definition.preserveRelativeLinks);
  }
  return builder;
}
