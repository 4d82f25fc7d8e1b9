import type { AttributeKey, AttributeValue, Domain, Protocol, TagName } from "./tokens.js";

// ---------------------------------------------------------------------------
// Element contract — supplied by the traversal
// ---------------------------------------------------------------------------

/**
 * The view of a markup element the decision engine needs. The traversal
 * that walks the parsed document provides an implementation.
 */
export interface PolicyElement {
  tagName(): string;
  hasAttribute(key: string): boolean;
  /** Raw, unresolved value; empty string when absent */
  getAttributeValue(key: string): string;
  /** Only called by {@link Policy.sanitizeAttribute} */
  setAttributeValue(key: string, value: string): void;
  /** Absolute URL for the attribute; empty string when absent, unparsable, or there is no base URI */
  resolveAbsoluteUrl(key: string): string;
}

// ---------------------------------------------------------------------------
// Registries
// ---------------------------------------------------------------------------

/** tag → attribute → set of values (protocols or domains) */
export type NestedRegistry<V> = ReadonlyMap<TagName, ReadonlyMap<AttributeKey, ReadonlySet<V>>>;

/** Read-only view of every allow-list registry */
export interface PolicyState {
  readonly tags: ReadonlySet<TagName>;
  readonly attributes: ReadonlyMap<TagName, ReadonlySet<AttributeKey>>;
  readonly enforcedAttributes: ReadonlyMap<TagName, ReadonlyMap<AttributeKey, AttributeValue>>;
  readonly protocols: NestedRegistry<Protocol>;
  readonly domains: NestedRegistry<Domain>;
  readonly preserveRelativeLinks: boolean;
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface PolicyBuilderOptions {
  /** Receives configuration warnings. Defaults to `console.warn` with a `[PolicyBuilder]` prefix. */
  readonly onWarning?: (message: string) => void;
}
