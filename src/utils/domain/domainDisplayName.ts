/**
 * Domain display names for extraction sources
 */

import { COMMON_TLDS, TWO_PART_TLDS } from "@/constants/htmlText";

/**
 * Registrable (apex) domain of a host
 *
 * "docs.github.com" → "github.com", "www.example.co.uk" → "example.co.uk"
 */
function apexDomain(host: string): string {
  const parts = host.split(".");
  if (parts.length < 2) {
    return host;
  }

  if (parts.length >= 3) {
    const lastTwo = parts.slice(-2).join(".");
    if (TWO_PART_TLDS.includes(lastTwo)) {
      return parts.slice(-3).join(".");
    }
  }

  return parts.slice(-2).join(".");
}

/**
 * Drop a trailing common TLD ("github.com" → "github"); others are kept
 */
function stripCommonTld(apex: string): string {
  const parts = apex.split(".");
  if (parts.length < 2) {
    return apex;
  }
  const tld = parts[parts.length - 1];
  return COMMON_TLDS.includes(tld) ? parts.slice(0, -1).join(".") : apex;
}

/**
 * Short label for the site a URL belongs to
 *
 * @example
 * domainDisplayName("https://docs.github.com/en") // "github"
 * domainDisplayName("https://web.dev/articles")   // "web.dev"
 * domainDisplayName("file:///tmp/page.html")      // "file:///tmp/page.html"
 */
export function domainDisplayName(url: string): string {
  if (!URL.canParse(url)) {
    return url;
  }
  const host = new URL(url).hostname.toLowerCase();
  if (!host) {
    return url;
  }
  return stripCommonTld(apexDomain(host));
}
