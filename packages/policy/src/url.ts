import { ANCHOR_PROTOCOL } from "./constants.js";
import type { Domain, Protocol } from "./tokens.js";

const WHITESPACE = /\s/;

/** Schemes whose URLs carry a host that domain rules can judge */
const HOST_PROTOCOLS: ReadonlySet<string> = new Set(["http:", "https:", "ftp:", "file:"]);

/** An in-page fragment reference: starts with `#`, no whitespace anywhere */
export function isValidAnchor(value: string): boolean {
  return value.startsWith("#") && !WHITESPACE.test(value);
}

/**
 * True when `value` carries one of `protocols`. The `#` protocol admits
 * anchors; any other protocol must prefix the value as `scheme:`,
 * compared case-insensitively.
 */
export function matchesProtocol(value: string, protocols: Iterable<Protocol>): boolean {
  const lowered = value.toLowerCase();
  for (const protocol of protocols) {
    if (protocol === ANCHOR_PROTOCOL) {
      if (isValidAnchor(value)) return true;
      continue;
    }
    if (lowered.startsWith(`${protocol}:`)) return true;
  }
  return false;
}

/**
 * Best-effort absolute form of a link that could not be resolved against a
 * base URI: protocol-relative links get `http:`, anything else `http://`.
 */
export function coerceAbsoluteUrl(raw: string): string {
  return raw.startsWith("//") ? `http:${raw}` : `http://${raw}`;
}

/**
 * Lower-cased host of `url`, or undefined when it does not parse, has no
 * host, or uses a scheme outside http, https, ftp and file.
 */
export function extractHost(url: string): string | undefined {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return undefined;
  }
  if (!HOST_PROTOCOLS.has(parsed.protocol)) {
    return undefined;
  }
  const host = parsed.hostname.toLowerCase();
  return host.trim().length > 0 ? host : undefined;
}

/** Exact host match, or a subdomain of one of `domains` */
export function hostMatchesDomain(host: string, domains: Iterable<Domain>): boolean {
  for (const domain of domains) {
    if (host === domain || host.endsWith(`.${domain}`)) return true;
  }
  return false;
}
