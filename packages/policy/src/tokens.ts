import { domainToASCII } from "node:url";

import { InvalidTokenError } from "@tagwarden/errors";

// ---------------------------------------------------------------------------
// Branded token types
// ---------------------------------------------------------------------------

/** Element name, trimmed and lower-cased. */
export type TagName = string & { readonly __brand: "TagName" };

/** Attribute name, trimmed and lower-cased. */
export type AttributeKey = string & { readonly __brand: "AttributeKey" };

/** Attribute value, kept verbatim. */
export type AttributeValue = string & { readonly __brand: "AttributeValue" };

/** URL scheme without the trailing colon, or `#` for anchors. Lower-cased. */
export type Protocol = string & { readonly __brand: "Protocol" };

/** Host suffix matched against URL hosts. Lower-cased, IDNs in their `xn--` form. */
export type Domain = string & { readonly __brand: "Domain" };

export type TokenNamespace = "TagName" | "AttributeKey" | "AttributeValue" | "Protocol" | "Domain";

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

function normalize(namespace: TokenNamespace, raw: unknown, lowerCase: boolean): string {
  if (typeof raw !== "string") {
    throw new InvalidTokenError(namespace, raw);
  }
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    throw new InvalidTokenError(namespace, raw);
  }
  return lowerCase ? trimmed.toLowerCase() : raw;
}

export function toTagName(raw: string): TagName {
  return normalize("TagName", raw, true) as TagName;
}

export function toAttributeKey(raw: string): AttributeKey {
  return normalize("AttributeKey", raw, true) as AttributeKey;
}

export function toAttributeValue(raw: string): AttributeValue {
  return normalize("AttributeValue", raw, false) as AttributeValue;
}

export function toProtocol(raw: string): Protocol {
  return normalize("Protocol", raw, true) as Protocol;
}

export function toDomain(raw: string): Domain {
  const lowered = normalize("Domain", raw, true);
  const ascii = domainToASCII(lowered);
  return (ascii.length > 0 ? ascii : lowered) as Domain;
}

/**
 * Like the `to*` constructors but answers `undefined` for blank input.
 * Read paths use this: a blank name is never allowed, and never an error.
 */
export function tryToken<T>(factory: (raw: string) => T, raw: string | null | undefined): T | undefined {
  if (typeof raw !== "string" || raw.trim().length === 0) {
    return undefined;
  }
  return factory(raw);
}
