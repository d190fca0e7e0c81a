/**
 * Link enricher: process-wide owner of the preview and icon caches
 *
 * Construct once per process and inject into the extraction pipeline;
 * every session then shares the same caches and in-flight fetches.
 */

import type { FetchOptions, HttpRequestFn, PreviewMetadata, SiteIcon } from "@/types";
import { DEFAULT_ICON_ENDPOINT } from "@/constants";
import { httpRequest } from "@/clients/http";
import { MemoizingFetchCache } from "@/cache";
import { fetchPreviewMetadata } from "./previewMetadata";
import { fetchSiteIcon, iconHostFor } from "./siteIcon";

export type LinkEnricherOptions = {
  request?: HttpRequestFn;
  /** Icon lookup URL template containing "{host}" */
  iconEndpoint?: string;
};

export class LinkEnricher {
  /** Keyed by page URL */
  readonly previews = new MemoizingFetchCache<string, PreviewMetadata>("preview");
  /** Keyed by lowercased host */
  readonly icons = new MemoizingFetchCache<string, SiteIcon>("icon");

  private readonly request: HttpRequestFn;
  private readonly iconEndpoint: string;

  constructor(options: LinkEnricherOptions = {}) {
    this.request = options.request ?? httpRequest;
    this.iconEndpoint = options.iconEndpoint ?? DEFAULT_ICON_ENDPOINT;
  }

  /**
   * Preview metadata for a page, fetched at most once per URL
   */
  preview(url: string, options: FetchOptions = {}): Promise<PreviewMetadata | undefined> {
    return this.previews.get(
      url,
      (signal) => fetchPreviewMetadata(url, { request: this.request, signal }),
      options,
    );
  }

  /**
   * Icon for the host of a URL, fetched at most once per host
   */
  async icon(url: string, options: FetchOptions = {}): Promise<SiteIcon | undefined> {
    const host = iconHostFor(url);
    if (!host) {
      return undefined;
    }
    return this.icons.get(
      host,
      (signal) =>
        fetchSiteIcon(host, { request: this.request, endpoint: this.iconEndpoint, signal }),
      options,
    );
  }

  /**
   * Warm the preview cache; results land in the cache, nothing is returned
   */
  async prefetchPreviews(urls: readonly string[]): Promise<void> {
    await Promise.all(urls.map((url) => this.preview(url)));
  }
}
