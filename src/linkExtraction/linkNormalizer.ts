/**
 * Link normalizer
 *
 * Extracts anchor links from one page's HTML and reduces them to an
 * ordered, deduplicated set of canonical links. Regex-based and
 * deterministic; malformed anchors are skipped rather than repaired.
 */

import type { NormalizedLink } from "@/types";
import { ANCHOR_PATTERN } from "@/constants";
import { decodeHtmlEntities, htmlToDisplayText } from "@/utils/text/htmlText";
import { canonicalizeHref, isNonNavigationalHref, upgradeToHttps } from "./canonicalUrl";

/**
 * Raw anchor as found in the HTML
 */
export type RawAnchor = {
  href: string;
  innerHtml: string;
};

/**
 * Scan HTML for <a> elements with an href, in document order
 *
 * Attribute order and quote style are irrelevant; the inner HTML may span
 * lines. The href is entity-decoded (attribute values are HTML text).
 */
export function scanAnchors(html: string): RawAnchor[] {
  const anchors: RawAnchor[] = [];
  for (const match of html.matchAll(ANCHOR_PATTERN)) {
    const href = decodeHtmlEntities(match[2]).trim();
    if (href.length === 0) {
      continue;
    }
    anchors.push({ href, innerHtml: match[3] });
  }
  return anchors;
}

/**
 * Extract the canonical, deduplicated http(s) links referenced by a page
 *
 * Rules, in order, for each anchor:
 * 1. javascript:, mailto:, tel:, data: and bare fragments are skipped
 * 2. the href is resolved against baseUrl (absolute hrefs are kept)
 * 3. non-http(s) results are skipped
 * 4. the first anchor for a canonical resource wins (position and text);
 *    a later https reference upgrades a stored http URL in place
 *
 * @param html - Raw page source
 * @param baseUrl - URL of the page, used for relative hrefs
 * @returns Links in anchor encounter order, unique by key; empty when
 * baseUrl is not a valid URL
 */
export function normalizeLinks(html: string, baseUrl: string): NormalizedLink[] {
  const links: NormalizedLink[] = [];
  if (!URL.canParse(baseUrl)) {
    return links;
  }
  const indexByKey = new Map<string, number>();

  for (const anchor of scanAnchors(html)) {
    if (isNonNavigationalHref(anchor.href)) {
      continue;
    }

    const canonical = canonicalizeHref(anchor.href, baseUrl);
    if (!canonical) {
      continue;
    }

    const existingIndex = indexByKey.get(canonical.key);
    if (existingIndex !== undefined) {
      const existing = links[existingIndex];
      if (canonical.protocol === "https:" && existing.url.startsWith("http:")) {
        links[existingIndex] = { ...existing, url: upgradeToHttps(existing.url) };
      }
      continue;
    }

    indexByKey.set(canonical.key, links.length);
    const anchorText = htmlToDisplayText(anchor.innerHtml);
    links.push(
      anchorText === undefined
        ? { url: canonical.url, key: canonical.key }
        : { url: canonical.url, key: canonical.key, anchorText },
    );
  }

  return links;
}
