/**
 * Link extraction constants
 */

/**
 * Anchor elements carrying an href attribute.
 * Groups: 1 = quote char, 2 = href value, 3 = inner HTML.
 * Attributes may appear before or after href; quotes must match.
 */
export const ANCHOR_PATTERN =
  /<a\s+(?:[^>]*?\s)?href\s*=\s*(["'])(.*?)\1[^>]*>([\s\S]*?)<\/a\s*>/gi;

/**
 * href prefixes that never produce a link (compared lowercased)
 */
export const NON_NAVIGATIONAL_PREFIXES: readonly string[] = [
  "javascript:",
  "mailto:",
  "tel:",
  "data:",
  "#",
];

export const HTTP_PROTOCOLS: readonly string[] = ["http:", "https:"];

/**
 * Title resolution tunables
 */
export const TITLE_FETCH = {
  /** Only the first bytes of a page are requested */
  MAX_BYTES: 4096,
  /** Per-attempt timeout */
  TIMEOUT_MS: 5_000,
  /** Attempts including the first one */
  MAX_ATTEMPTS: 3,
  /** Delay before the first retry; doubles for each further retry */
  INITIAL_BACKOFF_MS: 100,
  HEADERS: {
    Accept: "text/html",
  },
} as const;

/**
 * First <title> element, any attributes, spanning lines
 */
export const TITLE_PATTERN = /<title[^>]*>([\s\S]*?)<\/title>/i;

/**
 * Pseudo-window name prefix when a session is shown as a tab list
 */
export const EXTRACTED_WINDOW_PREFIX = "Extracted from";
