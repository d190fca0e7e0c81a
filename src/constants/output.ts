/**
 * Output formatting constants
 */

export const OUTPUT_FORMATS = ["list", "plain", "html"] as const;
