/**
 * HTML text constants: named entities and display-domain tables
 */

/**
 * Named entities decoded in anchor text, titles and meta content
 */
export const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  ndash: "–",
  mdash: "—",
  lsquo: "‘",
  rsquo: "’",
  ldquo: "“",
  rdquo: "”",
  hellip: "…",
  copy: "©",
  reg: "®",
  trade: "™",
  middot: "·",
  laquo: "«",
  raquo: "»",
  bull: "•",
};

/**
 * TLDs dropped from domain display names ("github.com" → "github")
 */
export const COMMON_TLDS: readonly string[] = ["com", "org", "net"];

/**
 * Public suffixes made of two labels, kept whole when finding the apex domain
 */
export const TWO_PART_TLDS: readonly string[] = [
  "co.uk",
  "com.au",
  "co.nz",
  "co.jp",
  "org.uk",
];
