export { LinkEnricher } from "./linkEnricher";
export type { LinkEnricherOptions } from "./linkEnricher";
export { parsePreviewMetadata, fetchPreviewMetadata } from "./previewMetadata";
export { detectImageFormat, buildIconLookupUrl, iconHostFor, fetchSiteIcon } from "./siteIcon";
