/**
 * Link extraction type definitions
 *
 * Shapes produced by the link normalizer and mutated by an extraction session.
 */

/**
 * Title enrichment progress for one link
 *
 * Transitions are monotonic: pending → fetching → success | failed.
 */
export type LinkEnrichmentState = "pending" | "fetching" | "success" | "failed";

/**
 * A link as produced by the normalizer (one per canonical resource)
 */
export type NormalizedLink = {
  /** Canonical URL (fragment stripped, non-root trailing slash removed) */
  url: string;
  /** Scheme-less dedup key, e.g. "//example.com/docs?q=1" */
  key: string;
  /** Inner text of the first anchor pointing at this resource */
  anchorText?: string;
};

/**
 * A link tracked by an extraction session
 */
export type ExtractedLink = {
  url: string;
  anchorText?: string;
  /** Title resolved from the linked page itself */
  title?: string;
  state: LinkEnrichmentState;
};

/**
 * Page the links were extracted from
 */
export type ExtractionSource = {
  url: string;
  title: string;
  html: string;
};

/**
 * Final pair handed to the output collaborator
 */
export type TitleUrlPair = {
  title: string;
  url: string;
};
