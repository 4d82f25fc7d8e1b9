import { lookupNested } from "./registry.js";
import { toAttributeKey, toDomain, toProtocol, toTagName, tryToken } from "./tokens.js";
import type { PolicyState } from "./types.js";

// Configuration queries shared by PolicyBuilder and Policy. Blank input is
// never configured.

export function isTagConfigured(state: PolicyState, tag: string): boolean {
  const tagName = tryToken(toTagName, tag);
  return tagName !== undefined && state.tags.has(tagName);
}

export function isAttributeConfigured(state: PolicyState, tag: string, key: string): boolean {
  const tagName = tryToken(toTagName, tag);
  const attrKey = tryToken(toAttributeKey, key);
  if (tagName === undefined || attrKey === undefined) return false;
  return state.tags.has(tagName) && (state.attributes.get(tagName)?.has(attrKey) ?? false);
}

export function isProtocolConfigured(
  state: PolicyState,
  tag: string,
  key: string,
  protocol: string,
): boolean {
  const tagName = tryToken(toTagName, tag);
  const attrKey = tryToken(toAttributeKey, key);
  const prot = tryToken(toProtocol, protocol);
  if (tagName === undefined || attrKey === undefined || prot === undefined) return false;
  return lookupNested(state.protocols, tagName, attrKey)?.has(prot) ?? false;
}

export function isDomainConfigured(
  state: PolicyState,
  tag: string,
  key: string,
  domain: string,
): boolean {
  const tagName = tryToken(toTagName, tag);
  const attrKey = tryToken(toAttributeKey, key);
  const dom = tryToken(toDomain, domain);
  if (tagName === undefined || attrKey === undefined || dom === undefined) return false;
  return lookupNested(state.domains, tagName, attrKey)?.has(dom) ?? false;
}
