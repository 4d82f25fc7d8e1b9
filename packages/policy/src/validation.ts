import type { AttributeKey, Domain, Protocol } from "./tokens.js";
import type { PolicyElement } from "./types.js";
import {
  coerceAbsoluteUrl,
  extractHost,
  hostMatchesDomain,
  isValidAnchor,
  matchesProtocol,
} from "./url.js";

/**
 * Absolute form of the attribute's URL, or the raw value when it cannot be
 * resolved. The raw fallback lets custom schemes such as `tel:` through to
 * the protocol check.
 */
export function resolveLinkValue(element: PolicyElement, key: AttributeKey): string {
  const absolute = element.resolveAbsoluteUrl(key);
  return absolute.length > 0 ? absolute : element.getAttributeValue(key);
}

/** Protocol check for one attribute. Never writes to the element. */
export function isProtocolValid(
  element: PolicyElement,
  key: AttributeKey,
  protocols: ReadonlySet<Protocol>,
): boolean {
  return matchesProtocol(resolveLinkValue(element, key), protocols);
}

/**
 * Domain check for one attribute. An absent or empty domain set leaves the
 * attribute unrestricted; anything that does not yield a host is rejected.
 */
export function isDomainValid(
  element: PolicyElement,
  key: AttributeKey,
  domains: ReadonlySet<Domain> | undefined,
): boolean {
  if (!domains || domains.size === 0) {
    return true;
  }

  const raw = element.getAttributeValue(key);
  if (raw.trim().length === 0) {
    return false;
  }
  if (raw.startsWith("#")) {
    return isValidAnchor(raw);
  }

  const resolved = element.resolveAbsoluteUrl(key);
  const host = extractHost(resolved.length > 0 ? resolved : coerceAbsoluteUrl(raw));
  return host !== undefined && hostMatchesDomain(host, domains);
}
