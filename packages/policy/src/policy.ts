import { HREF_ATTRIBUTE, SRC_ATTRIBUTE, WILDCARD_TAG } from "./constants.js";
import type { PolicyDefinition } from "./definition/schema.js";
import {
  isAttributeConfigured,
  isDomainConfigured,
  isProtocolConfigured,
  isTagConfigured,
} from "./introspection.js";
import { cloneState, lookupNested } from "./registry.js";
import {
  type AttributeKey,
  type TagName,
  toAttributeKey,
  toTagName,
  tryToken,
} from "./tokens.js";
import type { PolicyElement, PolicyState } from "./types.js";
import { isDomainValid, isProtocolValid, resolveLinkValue } from "./validation.js";

const HREF = toAttributeKey(HREF_ATTRIBUTE);
const SRC = toAttributeKey(SRC_ATTRIBUTE);

/** Outcome of an attribute check, noting whether a protocol rule decided it */
type AttributeDecision =
  | { readonly allowed: false }
  | { readonly allowed: true; readonly protocolChecked: boolean };

const DENIED: AttributeDecision = { allowed: false };

/**
 * Frozen allow-list consumed by a document traversal, one call per element
 * or attribute. Produced by {@link PolicyBuilder.build}.
 *
 * The predicates never throw on odd input: blank names, malformed URLs,
 * unresolvable links and hostless URLs are simply not allowed.
 */
export class Policy {
  private readonly registries: PolicyState;

  /** Copies `state`; later changes to the source never reach the policy. */
  constructor(state: PolicyState) {
    this.registries = cloneState(state);
    Object.freeze(this);
  }

  /** Detached copy of the registries */
  get state(): PolicyState {
    return cloneState(this.registries);
  }

  get preserveRelativeLinks(): boolean {
    return this.registries.preserveRelativeLinks;
  }

  // -------------------------------------------------------------------------
  // Decisions
  // -------------------------------------------------------------------------

  isTagNameAllowed(tag: string): boolean {
    const tagName = tryToken(toTagName, tag);
    return tagName !== undefined && this.registries.tags.has(tagName);
  }

  /**
   * Tag check plus element-level domain check. When the tag has domain
   * rules, `href` is judged if present and ruled, else `src`; a disallowed
   * host rejects the whole element.
   */
  isElementAllowed(element: PolicyElement): boolean {
    const tagName = tryToken(toTagName, element.tagName());
    if (tagName === undefined || !this.registries.tags.has(tagName)) {
      return false;
    }

    const byKey = this.registries.domains.get(tagName);
    if (!byKey) {
      return true;
    }

    const hrefDomains = byKey.get(HREF);
    if (hrefDomains && element.hasAttribute(HREF)) {
      return isDomainValid(element, HREF, hrefDomains);
    }
    const srcDomains = byKey.get(SRC);
    if (srcDomains && element.hasAttribute(SRC)) {
      return isDomainValid(element, SRC, srcDomains);
    }
    return true;
  }

  /**
   * Whether `key` may stay on an element of `tag`. Falls back to the `:all`
   * rules when the tag does not list the key. Never writes to `element`.
   */
  isAttributeAllowed(tag: string, element: PolicyElement, key: string): boolean {
    return this.evaluateAttribute(tag, element, key).allowed;
  }

  /**
   * Check an attribute and, when a protocol rule accepted it, write its
   * absolute URL back to the element. Nothing is written while relative
   * links are preserved. Rejected attributes are left untouched for the
   * caller to drop.
   */
  sanitizeAttribute(tag: string, element: PolicyElement, key: string): boolean {
    const decision = this.evaluateAttribute(tag, element, key);
    if (decision.allowed && decision.protocolChecked && !this.registries.preserveRelativeLinks) {
      const attrKey = toAttributeKey(key);
      element.setAttributeValue(attrKey, resolveLinkValue(element, attrKey));
    }
    return decision.allowed;
  }

  /**
   * The value an accepted URL attribute should carry on output: absolute
   * (raw when unresolvable) unless relative links are preserved.
   */
  resolveAttributeValue(element: PolicyElement, key: string): string {
    const attrKey = toAttributeKey(key);
    return this.registries.preserveRelativeLinks
      ? element.getAttributeValue(attrKey)
      : resolveLinkValue(element, attrKey);
  }

  /** Fresh record of the attributes to inject on every `tag` element */
  getEnforcedAttributes(tag: string): Record<string, string> {
    const result: Record<string, string> = {};
    const tagName = tryToken(toTagName, tag);
    const pairs = tagName === undefined ? undefined : this.registries.enforcedAttributes.get(tagName);
    if (pairs) {
      for (const [key, value] of pairs) {
        result[key] = value;
      }
    }
    return result;
  }

  private evaluateAttribute(tag: string, element: PolicyElement, key: string): AttributeDecision {
    const tagName = tryToken(toTagName, tag);
    const attrKey = tryToken(toAttributeKey, key);
    if (tagName === undefined || attrKey === undefined) {
      return DENIED;
    }
    return this.evaluateUnder(tagName, element, attrKey);
  }

  private evaluateUnder(
    tagName: TagName,
    element: PolicyElement,
    key: AttributeKey,
  ): AttributeDecision {
    if (this.registries.attributes.get(tagName)?.has(key)) {
      const protocols = lookupNested(this.registries.protocols, tagName, key);
      if (!protocols) {
        return { allowed: true, protocolChecked: false };
      }
      return isProtocolValid(element, key, protocols)
        ? { allowed: true, protocolChecked: true }
        : DENIED;
    }
    if (tagName === WILDCARD_TAG) {
      return DENIED;
    }
    return this.evaluateUnder(toTagName(WILDCARD_TAG), element, key);
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  isTagConfigured(tag: string): boolean {
    return isTagConfigured(this.registries, tag);
  }

  isAttributeConfigured(tag: string, key: string): boolean {
    return isAttributeConfigured(this.registries, tag, key);
  }

  isProtocolConfigured(tag: string, key: string, protocol: string): boolean {
    return isProtocolConfigured(this.registries, tag, key, protocol);
  }

  isDomainConfigured(tag: string, key: string, domain: string): boolean {
    return isDomainConfigured(this.registries, tag, key, domain);
  }

  /** Declarative form of this policy, with every list sorted */
  toDefinition(): PolicyDefinition {
    const sorted = (values: Iterable<string>): string[] => [...values].sort();

    const attributes: Record<string, string[]> = {};
    for (const [tag, keys] of this.registries.attributes) {
      attributes[tag] = sorted(keys);
    }

    const enforcedAttributes: Record<string, Record<string, string>> = {};
    for (const tag of this.registries.enforcedAttributes.keys()) {
      enforcedAttributes[tag] = this.getEnforcedAttributes(tag);
    }

    const nested = (registry: PolicyState["protocols"] | PolicyState["domains"]) => {
      const out: Record<string, Record<string, string[]>> = {};
      for (const [tag, byKey] of registry) {
        const entry: Record<string, string[]> = {};
        for (const [key, values] of byKey) {
          entry[key] = sorted(values);
        }
        out[tag] = entry;
      }
      return out;
    };

    return {
      tags: sorted(this.registries.tags),
      attributes,
      enforcedAttributes,
      protocols: nested(this.registries.protocols),
      domains: nested(this.registries.domains),
      preserveRelativeLinks: this.registries.preserveRelativeLinks,
    };
  }
}
