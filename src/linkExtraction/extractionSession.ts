/**
 * Link extraction session
 *
 * Holds the links extracted from one page for as long as they are shown,
 * runs one title task per link and keeps the task handles so the whole
 * session can be awaited or cancelled. Link updates arrive in no
 * particular order.
 */

import type { LimitFunction } from "p-limit";
import type {
  BrowserWindow,
  ExtractedLink,
  LinkEnrichmentState,
  Logger,
  NormalizedLink,
  PreviewMetadata,
  SiteIcon,
  TitleUrlPair,
  TransformSettings,
} from "@/types";
import { EXTRACTED_WINDOW_PREFIX } from "@/constants";
import type { LinkEnricher } from "@/enrichment";
import { applyTransformRules } from "@/transform";
import { domainDisplayName } from "@/utils/domain/domainDisplayName";
import * as logger from "@/logger";
import type { TitleResolver } from "./titleResolver";
import { canTransition, displayTitle, toExtractedLink } from "./extractedLink";

/**
 * Called after a link's state or title changed
 */
export type LinkUpdateListener = (link: Readonly<ExtractedLink>, index: number) => void;

export type LinkExtractionSessionParams = {
  sourceUrl: string;
  sourceTitle: string;
  links: readonly NormalizedLink[];
  titleResolver: TitleResolver;
  enricher: LinkEnricher;
  /** Shared bound on concurrent title fetches */
  limit: LimitFunction;
  onLinkUpdate?: LinkUpdateListener;
};

export class LinkExtractionSession {
  readonly sourceUrl: string;
  readonly sourceTitle: string;

  private readonly entries: ExtractedLink[];
  private readonly titleResolver: TitleResolver;
  private readonly enricher: LinkEnricher;
  private readonly limit: LimitFunction;
  private readonly onLinkUpdate?: LinkUpdateListener;
  private readonly controller = new AbortController();
  private readonly tasks: Promise<void>[] = [];
  private readonly log: Logger;

  constructor(params: LinkExtractionSessionParams) {
    this.sourceUrl = params.sourceUrl;
    this.sourceTitle = params.sourceTitle;
    this.entries = params.links.map(toExtractedLink);
    this.titleResolver = params.titleResolver;
    this.enricher = params.enricher;
    this.limit = params.limit;
    this.onLinkUpdate = params.onLinkUpdate;
    this.log = logger.withContext({ source: params.sourceUrl });
  }

  get links(): ReadonlyArray<Readonly<ExtractedLink>> {
    return this.entries;
  }

  /**
   * Short site label for the source page ("github", "web.dev")
   */
  get displayName(): string {
    return domainDisplayName(this.sourceUrl);
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Mark every link as fetching and launch one title task per link
   *
   * Calling it again (or after cancel) does nothing.
   */
  startTitleFetching(): void {
    if (this.tasks.length > 0 || this.cancelled) {
      return;
    }
    this.entries.forEach((_, index) => this.transition(index, "fetching"));
    this.entries.forEach((_, index) => {
      this.tasks.push(this.fetchTitle(index));
    });
    this.log.debug("Title fetching started", { links: this.entries.length });
  }

  /**
   * Resolves once every title task has finished
   */
  async settled(): Promise<void> {
    await Promise.all(this.tasks);
  }

  /**
   * Abort in-flight title fetches; links still fetching become failed
   */
  cancel(): void {
    if (this.cancelled) {
      return;
    }
    this.controller.abort();
    this.entries.forEach((link, index) => {
      if (link.state === "fetching") {
        this.transition(index, "failed");
      }
    });
    this.log.debug("Session cancelled");
  }

  preview(link: Readonly<ExtractedLink>, signal?: AbortSignal): Promise<PreviewMetadata | undefined> {
    return this.enricher.preview(link.url, { signal });
  }

  icon(link: Readonly<ExtractedLink>, signal?: AbortSignal): Promise<SiteIcon | undefined> {
    return this.enricher.icon(link.url, { signal });
  }

  sourceIcon(signal?: AbortSignal): Promise<SiteIcon | undefined> {
    return this.enricher.icon(this.sourceUrl, { signal });
  }

  /**
   * Warm the shared preview cache for every link
   */
  prefetchPreviews(): Promise<void> {
    return this.enricher.prefetchPreviews(this.entries.map((link) => link.url));
  }

  /**
   * Present the links as a pseudo browser window (first link active)
   */
  toWindow(): BrowserWindow {
    return {
      index: 1,
      name: `${EXTRACTED_WINDOW_PREFIX} ${this.sourceTitle}`,
      tabs: this.entries.map((link, i) => ({
        index: i + 1,
        title: displayTitle(link),
        url: link.url,
        isActive: i === 0,
      })),
    };
  }

  /**
   * Display title and URL of every link, rewritten by the transform rules
   */
  outputPairs(settings: TransformSettings, scopeKey?: string): TitleUrlPair[] {
    return this.entries.map((link) =>
      applyTransformRules({ title: displayTitle(link), url: link.url }, settings, scopeKey),
    );
  }

  private async fetchTitle(index: number): Promise<void> {
    const { url } = this.entries[index];
    const signal = this.controller.signal;
    const title = await this.limit(() => this.titleResolver.resolveTitle(url, { signal }));

    if (title !== undefined && !signal.aborted) {
      this.transition(index, "success", title);
    } else {
      this.transition(index, "failed");
    }
  }

  /**
   * Move a link forward; backward or repeated transitions are ignored
   */
  private transition(index: number, next: LinkEnrichmentState, title?: string): void {
    const current = this.entries[index];
    if (!canTransition(current.state, next)) {
      return;
    }

    const updated: ExtractedLink = { ...current, state: next };
    if (title !== undefined) {
      updated.title = title;
    }
    this.entries[index] = updated;
    this.notify(updated, index);
  }

  private notify(link: ExtractedLink, index: number): void {
    if (!this.onLinkUpdate) {
      return;
    }
    try {
      this.onLinkUpdate(link, index);
    } catch (err) {
      this.log.warn("Link update listener threw", {
        url: link.url,
        error: logger.describeError(err),
      });
    }
  }
}
