/**
 * Link extraction pipeline: composition root
 *
 * Built once per process. Owns the title resolver, the enricher (and with
 * it the preview/icon caches) and the concurrency bound, and turns pages
 * into extraction sessions.
 */

import pLimit, { type LimitFunction } from "p-limit";
import type { BrowserTab, ExtractionSource, HttpRequestFn } from "@/types";
import type { TabSource } from "@/interfaces/tabSource/tabSource";
import { LinkEnricher } from "@/enrichment";
import * as logger from "@/logger";
import { normalizeLinks } from "./linkNormalizer";
import { TitleResolver } from "./titleResolver";
import { LinkExtractionSession, type LinkUpdateListener } from "./extractionSession";

export type LinkExtractionPipelineOptions = {
  /** Used for every component not supplied explicitly */
  request?: HttpRequestFn;
  titleResolver?: TitleResolver;
  enricher?: LinkEnricher;
  iconEndpoint?: string;
  /** Bound on concurrent title fetches across all sessions; unbounded by default */
  maxConcurrency?: number;
};

export type ExtractOptions = {
  onLinkUpdate?: LinkUpdateListener;
};

export class LinkExtractionPipeline {
  readonly titleResolver: TitleResolver;
  readonly enricher: LinkEnricher;
  private readonly limit: LimitFunction;

  constructor(options: LinkExtractionPipelineOptions = {}) {
    this.titleResolver =
      options.titleResolver ?? new TitleResolver({ request: options.request });
    this.enricher =
      options.enricher ??
      new LinkEnricher({ request: options.request, iconEndpoint: options.iconEndpoint });
    this.limit = pLimit(options.maxConcurrency ?? Number.POSITIVE_INFINITY);
  }

  /**
   * Normalize a page's links and start resolving their titles
   */
  extract(source: ExtractionSource, options: ExtractOptions = {}): LinkExtractionSession {
    const links = normalizeLinks(source.html, source.url);
    logger.info("Links extracted", { source: source.url, links: links.length });

    const session = new LinkExtractionSession({
      sourceUrl: source.url,
      sourceTitle: source.title,
      links,
      titleResolver: this.titleResolver,
      enricher: this.enricher,
      limit: this.limit,
      onLinkUpdate: options.onLinkUpdate,
    });
    session.startTitleFetching();
    return session;
  }

  /**
   * Read a tab's page source from the browser collaborator and extract it
   *
   * @throws Whatever the tab source throws when the page cannot be read
   */
  async extractFromTab(
    tabSource: TabSource,
    tab: BrowserTab,
    options: ExtractOptions = {},
  ): Promise<LinkExtractionSession> {
    logger.debug("Reading page source", { tabSource: tabSource.id, url: tab.url });
    const html = await tabSource.getPageSource(tab);
    return this.extract({ url: tab.url, title: tab.title, html }, options);
  }
}
