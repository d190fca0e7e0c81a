/**
 * Display helpers and state transitions for extracted links
 */

import type { ExtractedLink, LinkEnrichmentState, NormalizedLink } from "@/types";

const STATE_RANK: Record<LinkEnrichmentState, number> = {
  pending: 0,
  fetching: 1,
  success: 2,
  failed: 2,
};

/**
 * Fresh session link for a normalized link
 */
export function toExtractedLink(link: NormalizedLink): ExtractedLink {
  return link.anchorText === undefined
    ? { url: link.url, state: "pending" }
    : { url: link.url, anchorText: link.anchorText, state: "pending" };
}

/**
 * Whether a link may move from one state to another (forward only; the two
 * terminal states never change)
 */
export function canTransition(from: LinkEnrichmentState, to: LinkEnrichmentState): boolean {
  return STATE_RANK[to] > STATE_RANK[from];
}

/**
 * Resolved title, else anchor text, else the URL itself
 */
export function displayTitle(link: Readonly<ExtractedLink>): string {
  return link.title ?? link.anchorText ?? link.url;
}

/**
 * True while the displayed title is only a stand-in for the resolved one
 */
export function isTitleProvisional(link: Readonly<ExtractedLink>): boolean {
  return link.title === undefined && link.state !== "success";
}
