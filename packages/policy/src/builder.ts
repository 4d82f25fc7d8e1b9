import { InvalidArgumentError } from "@tagwarden/errors";
import { LOG_TAG, WILDCARD_TAG } from "./constants.js";
import {
  isAttributeConfigured,
  isDomainConfigured,
  isProtocolConfigured,
  isTagConfigured,
} from "./introspection.js";
import { Policy } from "./policy.js";
import {
  addNested,
  cloneMapMap,
  cloneNested,
  cloneSetMap,
  type MutableNestedRegistry,
  removeNested,
} from "./registry.js";
import {
  type AttributeKey,
  type AttributeValue,
  type Domain,
  type Protocol,
  type TagName,
  toAttributeKey,
  toAttributeValue,
  toDomain,
  toProtocol,
  toTagName,
} from "./tokens.js";
import type { PolicyBuilderOptions, PolicyState } from "./types.js";

function defaultWarn(message: string): void {
  console.warn(`[${LOG_TAG}] ${message}`);
}

function requireString(argument: string, value: string | null | undefined): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new InvalidArgumentError(argument, "must be a non-empty string");
  }
  return value;
}

function requireList(argument: string, values: readonly (string | null | undefined)[]): string[] {
  if (values.length === 0) {
    throw new InvalidArgumentError(argument, "at least one value is required");
  }
  return values.map((value, index) => requireString(`${argument}[${index}]`, value));
}

/**
 * Mutable allow-list under configuration.
 *
 * Every mutation validates all of its arguments before writing, so a call
 * that throws leaves the builder unchanged. `build()` takes a frozen
 * {@link Policy} snapshot for the decision phase; later mutations never
 * reach an already-built policy.
 *
 * ```ts
 * const policy = new PolicyBuilder()
 *   .addTags("p", "em")
 *   .addAttributes("a", "href")
 *   .addProtocols("a", "href", "https")
 *   .build();
 * ```
 */
export class PolicyBuilder {
  private readonly tags: Set<TagName>;
  private readonly attributes: Map<TagName, Set<AttributeKey>>;
  private readonly enforcedAttributes: Map<TagName, Map<AttributeKey, AttributeValue>>;
  private readonly protocols: MutableNestedRegistry<Protocol>;
  private readonly domains: MutableNestedRegistry<Domain>;
  private relativeLinks: boolean;
  private readonly onWarning: (message: string) => void;

  constructor(options?: PolicyBuilderOptions, initial?: PolicyState) {
    this.tags = new Set<TagName>(initial?.tags);
    this.attributes = initial ? cloneSetMap(initial.attributes) : new Map();
    this.enforcedAttributes = initial ? cloneMapMap(initial.enforcedAttributes) : new Map();
    this.protocols = initial ? cloneNested(initial.protocols) : new Map();
    this.domains = initial ? cloneNested(initial.domains) : new Map();
    this.relativeLinks = initial?.preserveRelativeLinks ?? false;
    this.onWarning = options?.onWarning ?? defaultWarn;
  }

  /** Start a new builder from an existing policy (or its state) */
  static from(source: Policy | PolicyState, options?: PolicyBuilderOptions): PolicyBuilder {
    return new PolicyBuilder(options, source instanceof Policy ? source.state : source);
  }

  /** Live read-only view of the registries */
  get state(): PolicyState {
    return {
      tags: this.tags,
      attributes: this.attributes,
      enforcedAttributes: this.enforcedAttributes,
      protocols: this.protocols,
      domains: this.domains,
      preserveRelativeLinks: this.relativeLinks,
    };
  }

  // -------------------------------------------------------------------------
  // Tags
  // -------------------------------------------------------------------------

  addTags(...tags: string[]): this {
    const names = requireList("tags", tags).map(toTagName);
    for (const name of names) {
      this.tags.add(name);
    }
    return this;
  }

  /** Disallow tags and drop every rule registered under them */
  removeTags(...tags: string[]): this {
    const names = requireList("tags", tags).map(toTagName);
    for (const name of names) {
      if (this.tags.delete(name)) {
        this.attributes.delete(name);
        this.enforcedAttributes.delete(name);
        this.protocols.delete(name);
        this.domains.delete(name);
      }
    }
    return this;
  }

  // -------------------------------------------------------------------------
  // Attributes
  // -------------------------------------------------------------------------

  /**
   * Allow attributes on a tag, allowing the tag too. Use the `:all` pseudo
   * tag for attributes valid on every tag.
   */
  addAttributes(tag: string, ...keys: string[]): this {
    const tagName = toTagName(requireString("tag", tag));
    const attrKeys = requireList("keys", keys).map(toAttributeKey);

    this.tags.add(tagName);
    let set = this.attributes.get(tagName);
    if (!set) {
      set = new Set();
      this.attributes.set(tagName, set);
    }
    for (const key of attrKeys) {
      set.add(key);
    }
    return this;
  }

  /**
   * Disallow attributes on a tag. Removing from `:all` also removes the
   * keys from every tag that lists them explicitly.
   */
  removeAttributes(tag: string, ...keys: string[]): this {
    const tagName = toTagName(requireString("tag", tag));
    const attrKeys = requireList("keys", keys).map(toAttributeKey);

    if (this.tags.has(tagName)) {
      this.removeAttributeKeys(tagName, attrKeys);
    }
    if (tagName === WILDCARD_TAG) {
      for (const name of [...this.attributes.keys()]) {
        this.removeAttributeKeys(name, attrKeys);
      }
    }
    return this;
  }

  private removeAttributeKeys(tagName: TagName, keys: readonly AttributeKey[]): void {
    const set = this.attributes.get(tagName);
    if (!set) return;
    for (const key of keys) {
      set.delete(key);
    }
    if (set.size === 0) {
      this.attributes.delete(tagName);
    }
  }

  // -------------------------------------------------------------------------
  // Enforced attributes
  // -------------------------------------------------------------------------

  /**
   * Always emit `key="value"` on the tag, overriding any input value. The
   * tag is allowed if it was not already.
   */
  addEnforcedAttribute(tag: string, key: string, value: string): this {
    const tagName = toTagName(requireString("tag", tag));
    const attrKey = toAttributeKey(requireString("key", key));
    const attrValue = toAttributeValue(requireString("value", value));

    this.tags.add(tagName);
    let pairs = this.enforcedAttributes.get(tagName);
    if (!pairs) {
      pairs = new Map();
      this.enforcedAttributes.set(tagName, pairs);
    }
    pairs.set(attrKey, attrValue);
    return this;
  }

  removeEnforcedAttribute(tag: string, key: string): this {
    const tagName = toTagName(requireString("tag", tag));
    const attrKey = toAttributeKey(requireString("key", key));

    const pairs = this.enforcedAttributes.get(tagName);
    if (this.tags.has(tagName) && pairs) {
      pairs.delete(attrKey);
      if (pairs.size === 0) {
        this.enforcedAttributes.delete(tagName);
      }
    }
    return this;
  }

  // -------------------------------------------------------------------------
  // Protocols
  // -------------------------------------------------------------------------

  /**
   * Restrict a URL attribute to the given schemes (without the colon). Add
   * `#` to admit in-page anchors such as `<a href="#top">`.
   */
  addProtocols(tag: string, key: string, ...protocols: string[]): this {
    const tagName = toTagName(requireString("tag", tag));
    const attrKey = toAttributeKey(requireString("key", key));
    const values = requireList("protocols", protocols).map(toProtocol);

    addNested(this.protocols, tagName, attrKey, values);
    return this;
  }

  removeProtocols(tag: string, key: string, ...protocols: string[]): this {
    const tagName = toTagName(requireString("tag", tag));
    const attrKey = toAttributeKey(requireString("key", key));
    const values = requireList("protocols", protocols).map(toProtocol);

    removeNested(this.protocols, tagName, attrKey, values);
    return this;
  }

  // -------------------------------------------------------------------------
  // Domains
  // -------------------------------------------------------------------------

  /** Restrict a URL attribute to hosts equal to, or under, the given domains */
  addDomains(tag: string, key: string, ...domains: string[]): this {
    const tagName = toTagName(requireString("tag", tag));
    const attrKey = toAttributeKey(requireString("key", key));
    const values = requireList("domains", domains).map(toDomain);

    addNested(this.domains, tagName, attrKey, values);
    return this;
  }

  removeDomains(tag: string, key: string, ...domains: string[]): this {
    const tagName = toTagName(requireString("tag", tag));
    const attrKey = toAttributeKey(requireString("key", key));
    const values = requireList("domains", domains).map(toDomain);

    removeNested(this.domains, tagName, attrKey, values);
    return this;
  }

  // -------------------------------------------------------------------------
  // Options
  // -------------------------------------------------------------------------

  /**
   * Keep relative links as written instead of rewriting them to absolute
   * URLs. Links must still resolve to an allowed protocol to be kept.
   */
  preserveRelativeLinks(preserve: boolean): this {
    this.relativeLinks = preserve;
    return this;
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  isTagConfigured(tag: string): boolean {
    return isTagConfigured(this.state, tag);
  }

  isAttributeConfigured(tag: string, key: string): boolean {
    return isAttributeConfigured(this.state, tag, key);
  }

  isProtocolConfigured(tag: string, key: string, protocol: string): boolean {
    return isProtocolConfigured(this.state, tag, key, protocol);
  }

  isDomainConfigured(tag: string, key: string, domain: string): boolean {
    return isDomainConfigured(this.state, tag, key, domain);
  }

  // -------------------------------------------------------------------------
  // Snapshot
  // -------------------------------------------------------------------------

  build(): Policy {
    this.warnOrphans("protocol", this.protocols.keys());
    this.warnOrphans("domain", this.domains.keys());

    return new Policy(this.state);
  }

  private warnOrphans(kind: string, tagNames: Iterable<TagName>): void {
    for (const tagName of tagNames) {
      if (!this.tags.has(tagName)) {
        this.onWarning(`${kind} rules for tag '${tagName}' have no effect: the tag is not allowed`);
      }
    }
  }
}
