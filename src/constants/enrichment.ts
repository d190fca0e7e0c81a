/**
 * Enrichment constants (preview metadata and site icons)
 */

/**
 * Preview metadata fetch tunables
 */
export const PREVIEW_FETCH = {
  /** Enough of the document to cover <head> */
  MAX_BYTES: 32_768,
  TIMEOUT_MS: 10_000,
  HEADERS: {
    Accept: "text/html",
  },
} as const;

/**
 * Meta names checked for each preview field, in priority order
 */
export const PREVIEW_META_KEYS = {
  title: ["og:title", "twitter:title"],
  description: ["og:description", "twitter:description"],
  image: ["og:image", "og:image:url", "twitter:image"],
} as const;

/**
 * Site icon fetch tunables
 */
export const ICON_FETCH = {
  TIMEOUT_MS: 10_000,
  HEADERS: {
    Accept: "image/*",
  },
} as const;

/**
 * Icon lookup endpoint; "{host}" is replaced with the URL-encoded host
 */
export const DEFAULT_ICON_ENDPOINT =
  "https://www.google.com/s2/favicons?domain={host}&sz=32";

export const ICON_HOST_PLACEHOLDER = "{host}";
