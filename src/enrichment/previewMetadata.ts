/**
 * Social-preview metadata (Open Graph / Twitter card)
 *
 * Scans <meta> tags lexically; property/name and content may appear in
 * either order with either quote style.
 */

import type { FetchOptions, HttpRequestFn, PreviewMetadata } from "@/types";
import { PREVIEW_FETCH, PREVIEW_META_KEYS } from "@/constants";
import { httpRequest, responseText } from "@/clients/http";
import { collapseWhitespace, decodeHtmlEntities } from "@/utils/text/htmlText";

const META_TAG_PATTERN = /<meta\b[^>]*>/gi;
const ATTRIBUTE_PATTERN = /([a-zA-Z_:-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

/**
 * Attribute map of one tag, names lowercased
 */
function parseAttributes(tag: string): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const match of tag.matchAll(ATTRIBUTE_PATTERN)) {
    const name = match[1].toLowerCase();
    if (!attributes.has(name)) {
      attributes.set(name, match[2] ?? match[3] ?? "");
    }
  }
  return attributes;
}

/**
 * Collect content values of <meta property|name=... content=...> tags
 * (first occurrence per key wins; keys lowercased)
 */
function collectMetaContent(html: string): Map<string, string> {
  const contents = new Map<string, string>();
  for (const [tag] of html.matchAll(META_TAG_PATTERN)) {
    const attributes = parseAttributes(tag);
    const key = attributes.get("property") ?? attributes.get("name");
    const content = attributes.get("content");
    if (key === undefined || content === undefined) {
      continue;
    }
    const normalizedKey = key.trim().toLowerCase();
    if (!contents.has(normalizedKey)) {
      contents.set(normalizedKey, content);
    }
  }
  return contents;
}

function firstContent(
  contents: Map<string, string>,
  keys: readonly string[],
): string | undefined {
  for (const key of keys) {
    const raw = contents.get(key);
    if (raw === undefined) {
      continue;
    }
    const value = collapseWhitespace(decodeHtmlEntities(raw));
    if (value.length > 0) {
      return value;
    }
  }
  return undefined;
}

function resolveImageUrl(value: string, pageUrl: string): string | undefined {
  if (URL.canParse(value, pageUrl)) {
    return new URL(value, pageUrl).href;
  }
  return undefined;
}

/**
 * Parse preview metadata out of page HTML
 *
 * @returns Metadata with at least one field, or undefined if none was found
 */
export function parsePreviewMetadata(html: string, pageUrl: string): PreviewMetadata | undefined {
  const contents = collectMetaContent(html);

  const metadata: PreviewMetadata = {};
  const title = firstContent(contents, PREVIEW_META_KEYS.title);
  const description = firstContent(contents, PREVIEW_META_KEYS.description);
  const image = firstContent(contents, PREVIEW_META_KEYS.image);

  if (title !== undefined) {
    metadata.title = title;
  }
  if (description !== undefined) {
    metadata.description = description;
  }
  if (image !== undefined) {
    const imageUrl = resolveImageUrl(image, pageUrl);
    if (imageUrl !== undefined) {
      metadata.imageUrl = imageUrl;
    }
  }

  return Object.keys(metadata).length > 0 ? metadata : undefined;
}

/**
 * Fetch the head of a page and parse its preview metadata
 *
 * Throws on transport/status errors; the cache in front of it turns those
 * into absence.
 */
export async function fetchPreviewMetadata(
  url: string,
  options: FetchOptions & { request?: HttpRequestFn } = {},
): Promise<PreviewMetadata | undefined> {
  const request = options.request ?? httpRequest;
  const response = await request({
    method: "GET",
    url,
    headers: {
      ...PREVIEW_FETCH.HEADERS,
      Range: `bytes=0-${PREVIEW_FETCH.MAX_BYTES - 1}`,
    },
    timeoutMs: PREVIEW_FETCH.TIMEOUT_MS,
    maxBytes: PREVIEW_FETCH.MAX_BYTES,
    retry: { maxAttempts: 1 },
    signal: options.signal,
  });
  return parsePreviewMetadata(responseText(response), url);
}
