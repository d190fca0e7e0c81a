/**
 * Transform rule constants
 */

export const TRANSFORM_TARGETS = ["title", "url"] as const;

/**
 * Flags used to compile every transform pattern (replace all matches)
 */
export const TRANSFORM_REGEX_FLAGS = "g";

/**
 * Trailing " · owner/repo" or " - owner/repo" appended to GitHub page titles
 */
export const GITHUB_SUFFIX_PATTERN = " [·\\-] [a-zA-Z0-9_.-]+/[a-zA-Z0-9_.-]+$";

export const GITHUB_URL_PREFIX = "https://github.com";
