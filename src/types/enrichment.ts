/**
 * Enrichment type definitions (preview metadata and site icons)
 */

/**
 * Social-preview metadata scraped from a page's <meta> tags
 *
 * At least one field is present; an all-empty result is reported as absence.
 */
export type PreviewMetadata = {
  title?: string;
  description?: string;
  /** Absolute image URL (resolved against the page URL) */
  imageUrl?: string;
};

export type ImageFormat = "png" | "ico" | "gif" | "jpeg" | "webp" | "bmp" | "svg";

/**
 * Icon image for a host, as returned by the icon lookup endpoint
 */
export type SiteIcon = {
  host: string;
  format: ImageFormat;
  contentType?: string;
  data: Uint8Array;
};

/**
 * Per-call options accepted by every cancellable fetch
 */
export type FetchOptions = {
  signal?: AbortSignal;
};
