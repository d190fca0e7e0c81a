/**
 * HTTP-backed tab source
 *
 * Presents a fixed list of URLs as a single browser window and reads page
 * source with a plain GET. Used by the CLI when no browser is attached.
 */

import type { BrowserTab, BrowserWindow, HttpRequestFn } from "@/types";
import type { TabSource } from "@/interfaces/tabSource/tabSource";
import { httpRequest, responseText } from "@/clients/http";
import { extractTitle } from "@/linkExtraction/titleResolver";
import * as logger from "@/logger";

const WINDOW_NAME = "Requested pages";

export class HttpTabSource implements TabSource {
  readonly id = "http";
  private readonly urls: readonly string[];
  private readonly request: HttpRequestFn;
  private readonly titles = new Map<string, string>();

  constructor(urls: readonly string[], request: HttpRequestFn = httpRequest) {
    this.urls = urls;
    this.request = request;
  }

  async listWindows(): Promise<BrowserWindow[]> {
    const tabs: BrowserTab[] = this.urls.map((url, i) => ({
      index: i + 1,
      title: this.titles.get(url) ?? url,
      url,
      isActive: i === 0,
    }));
    return [{ index: 1, name: WINDOW_NAME, tabs }];
  }

  /**
   * Fetch the tab's page; remembers its <title> for later listings
   *
   * @throws {HttpError} On non-2xx responses after retries
   */
  async getPageSource(tab: BrowserTab): Promise<string> {
    const response = await this.request({
      method: "GET",
      url: tab.url,
      headers: { Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8" },
    });
    const html = responseText(response);

    const title = extractTitle(html);
    if (title !== undefined) {
      this.titles.set(tab.url, title);
    }
    logger.debug("Fetched page source", { url: tab.url, bytes: response.body.byteLength });
    return html;
  }
}
