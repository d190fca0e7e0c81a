/**
 * HTML text utilities
 *
 * Regex-based helpers for turning HTML fragments into display text.
 * Not a DOM parser: tags are removed lexically and only a fixed set of
 * named entities is known.
 */

import { NAMED_ENTITIES } from "@/constants/htmlText";

const ENTITY_PATTERN = /&(?:#[xX]([0-9a-fA-F]+)|#([0-9]+)|([a-zA-Z][a-zA-Z0-9]*));/g;
const TAG_PATTERN = /<[^>]+>/g;
const WHITESPACE_RUN = /\s+/g;

/**
 * Convert a numeric code point to text, or undefined if it is not a valid scalar
 */
function fromCodePoint(codePoint: number): string | undefined {
  if (!Number.isFinite(codePoint) || codePoint > 0x10ffff) {
    return undefined;
  }
  // Lone surrogates are not Unicode scalar values
  if (codePoint >= 0xd800 && codePoint <= 0xdfff) {
    return undefined;
  }
  return String.fromCodePoint(codePoint);
}

/**
 * Decode numeric (&#38; &#x26;) and known named (&amp;) entities
 *
 * Unknown names and invalid code points are left as written.
 *
 * @example
 * decodeHtmlEntities("Tom &amp; Jerry &#8212; &#x41;") // "Tom & Jerry — A"
 */
export function decodeHtmlEntities(text: string): string {
  return text.replace(ENTITY_PATTERN, (match, hex?: string, dec?: string, name?: string) => {
    if (hex !== undefined) {
      return fromCodePoint(parseInt(hex, 16)) ?? match;
    }
    if (dec !== undefined) {
      return fromCodePoint(parseInt(dec, 10)) ?? match;
    }
    if (name !== undefined && Object.prototype.hasOwnProperty.call(NAMED_ENTITIES, name)) {
      return NAMED_ENTITIES[name];
    }
    return match;
  });
}

/**
 * Remove every tag, keeping the text between them
 */
export function stripTags(html: string): string {
  return html.replace(TAG_PATTERN, "");
}

/**
 * Collapse whitespace runs to single spaces and trim the ends
 */
export function collapseWhitespace(text: string): string {
  return text.replace(WHITESPACE_RUN, " ").trim();
}

/**
 * Turn an HTML fragment into display text: tags stripped, entities decoded,
 * whitespace collapsed. Returns undefined when nothing visible remains.
 */
export function htmlToDisplayText(html: string): string | undefined {
  const text = collapseWhitespace(decodeHtmlEntities(stripTags(html)));
  return text.length > 0 ? text : undefined;
}

/**
 * Escape text for use inside HTML element content or a quoted attribute
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
