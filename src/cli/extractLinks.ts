/**
 * Extract-links command
 *
 * Reads every requested page, extracts its links, waits for titles and
 * renders the rewritten pairs in the configured output format.
 */

import type { AppConfig, HttpRequestFn } from "@/types";
import { httpRequest } from "@/clients/http";
import { LinkExtractionPipeline, type LinkExtractionSession } from "@/linkExtraction";
import { HttpTabSource } from "@/tabSource";
import { resolveTransformSettings } from "@/transform";
import { formatLinks } from "@/output";
import * as logger from "@/logger";

export type ExtractLinksDeps = {
  request?: HttpRequestFn;
  /** Receives each live session so the caller can cancel it */
  onSession?: (session: LinkExtractionSession) => void;
};

/**
 * One rendered block per page, separated by a blank line
 *
 * @throws {HttpError} When a page cannot be fetched
 * @throws {TransformSettingsValidationError} When the rules file is invalid
 */
export async function extractLinks(
  urls: readonly string[],
  config: AppConfig,
  deps: ExtractLinksDeps = {},
): Promise<string> {
  const request = deps.request ?? httpRequest;
  const settings = resolveTransformSettings(config.rulesPath);
  const tabSource = new HttpTabSource(urls, request);
  const pipeline = new LinkExtractionPipeline({
    request,
    iconEndpoint: config.iconEndpoint,
    maxConcurrency: config.maxConcurrency,
  });

  const [pageWindow] = await tabSource.listWindows();
  const blocks: string[] = [];

  for (const tab of pageWindow.tabs) {
    const session = await pipeline.extractFromTab(tabSource, tab);
    deps.onSession?.(session);
    await session.settled();

    const failed = session.links.filter((link) => link.state === "failed").length;
    logger.info("Titles resolved", {
      source: session.sourceUrl,
      links: session.links.length,
      failed,
    });

    const pairs = session.outputPairs(settings, config.outputScope);
    if (pairs.length > 0) {
      blocks.push(formatLinks(pairs, config.outputFormat));
    }
  }

  return blocks.join("\n\n");
}
