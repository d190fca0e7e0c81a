/**
 * Canonical URL helpers for link deduplication
 *
 * Pure functions; no network access.
 */

import { HTTP_PROTOCOLS, NON_NAVIGATIONAL_PREFIXES } from "@/constants";

export type CanonicalUrl = {
  /** Fragment stripped, non-root trailing slash removed */
  url: string;
  /** url without its scheme, so http and https collapse together */
  key: string;
  protocol: "http:" | "https:";
};

/**
 * True for hrefs that never lead to a page (javascript:, mailto:, tel:, data:, #...)
 */
export function isNonNavigationalHref(href: string): boolean {
  const lowered = href.trim().toLowerCase();
  return NON_NAVIGATIONAL_PREFIXES.some((prefix) => lowered.startsWith(prefix));
}

function isHttpProtocol(protocol: string): protocol is CanonicalUrl["protocol"] {
  return HTTP_PROTOCOLS.includes(protocol);
}

/**
 * Parse an href as absolute first, so a bad base URL cannot hide it
 */
function parseHref(href: string, baseUrl: string): URL | null {
  if (URL.canParse(href)) {
    return new URL(href);
  }
  if (URL.canParse(href, baseUrl)) {
    return new URL(href, baseUrl);
  }
  return null;
}

/**
 * Resolve an href against a base URL and canonicalise it
 *
 * Absolute hrefs keep their own scheme and host; relative ones resolve
 * against baseUrl. Returns null for unparseable values and for anything
 * that is not http(s).
 *
 * @example
 * canonicalizeHref("/docs/#intro", "https://example.com/a")
 * // { url: "https://example.com/docs", key: "//example.com/docs", protocol: "https:" }
 */
export function canonicalizeHref(href: string, baseUrl: string): CanonicalUrl | null {
  const parsed = parseHref(href.trim(), baseUrl);
  if (!parsed) {
    return null;
  }

  const protocol = parsed.protocol;
  if (!isHttpProtocol(protocol)) {
    return null;
  }

  parsed.hash = "";
  if (parsed.pathname.length > 1 && parsed.pathname.endsWith("/")) {
    parsed.pathname = parsed.pathname.slice(0, -1);
  }

  const url = parsed.href;
  return {
    url,
    key: url.slice(protocol.length),
    protocol,
  };
}

/**
 * Swap an http URL's scheme for https, leaving the rest untouched
 */
export function upgradeToHttps(url: string): string {
  return url.startsWith("http:") ? "https:" + url.slice("http:".length) : url;
}
