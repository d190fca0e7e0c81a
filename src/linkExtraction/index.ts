export { normalizeLinks, scanAnchors } from "./linkNormalizer";
export type { RawAnchor } from "./linkNormalizer";
export { canonicalizeHref, isNonNavigationalHref, upgradeToHttps } from "./canonicalUrl";
export { TitleResolver, extractTitle } from "./titleResolver";
export { displayTitle, isTitleProvisional, canTransition } from "./extractedLink";
export { LinkExtractionSession } from "./extractionSession";
export type { LinkUpdateListener } from "./extractionSession";
export { LinkExtractionPipeline } from "./extractionPipeline";
export type { LinkExtractionPipelineOptions, ExtractOptions } from "./extractionPipeline";
