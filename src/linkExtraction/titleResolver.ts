/**
 * Title resolver
 *
 * Fetches the first few KiB of a linked page and reads its <title>.
 * Every failure mode (network, timeout, status, decoding, missing title)
 * ends in undefined; nothing is thrown to the caller.
 */

import type { FetchOptions, HttpRequestFn, Logger } from "@/types";
import { TITLE_FETCH, TITLE_PATTERN } from "@/constants";
import { HttpError, httpRequest, isAbortError, responseText } from "@/clients/http";
import { collapseWhitespace, decodeHtmlEntities } from "@/utils/text/htmlText";
import * as logger from "@/logger";

export type TitleResolverOptions = {
  request?: HttpRequestFn;
  /** Injected for tests; defaults to a timer-based sleep */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

/**
 * Read the first <title> element out of an HTML fragment
 *
 * @returns Entity-decoded, whitespace-collapsed title, or undefined if there
 * is no title element or it is blank
 */
export function extractTitle(html: string): string | undefined {
  const match = TITLE_PATTERN.exec(html);
  if (!match) {
    return undefined;
  }
  const title = collapseWhitespace(decodeHtmlEntities(match[1]));
  return title.length > 0 ? title : undefined;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class TitleResolver {
  private readonly request: HttpRequestFn;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  constructor(options: TitleResolverOptions = {}) {
    this.request = options.request ?? httpRequest;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? logger.withContext({ component: "titleResolver" });
  }

  /**
   * Resolve the title of the page at url
   *
   * Up to TITLE_FETCH.MAX_ATTEMPTS attempts; a missing title counts as a
   * failed attempt. Waits 100ms, then 200ms between attempts.
   * An aborted signal stops immediately.
   */
  async resolveTitle(url: string, options: FetchOptions = {}): Promise<string | undefined> {
    const { signal } = options;

    for (let attempt = 0; attempt < TITLE_FETCH.MAX_ATTEMPTS; attempt++) {
      if (attempt > 0) {
        await this.sleep(TITLE_FETCH.INITIAL_BACKOFF_MS * Math.pow(2, attempt - 1));
      }
      if (signal?.aborted) {
        return undefined;
      }

      const title = await this.attempt(url, signal);
      if (title !== undefined) {
        return title;
      }
    }

    this.log.debug("Title not resolved", { url, attempts: TITLE_FETCH.MAX_ATTEMPTS });
    return undefined;
  }

  private async attempt(url: string, signal?: AbortSignal): Promise<string | undefined> {
    try {
      const response = await this.request({
        method: "GET",
        url,
        headers: {
          ...TITLE_FETCH.HEADERS,
          Range: `bytes=0-${TITLE_FETCH.MAX_BYTES - 1}`,
        },
        timeoutMs: TITLE_FETCH.TIMEOUT_MS,
        maxBytes: TITLE_FETCH.MAX_BYTES,
        retry: { maxAttempts: 1 },
        signal,
      });
      return extractTitle(responseText(response));
    } catch (err) {
      this.log.debug("Title fetch attempt failed", {
        url,
        reason:
          err instanceof HttpError
            ? `status ${err.status}`
            : isAbortError(err)
              ? "aborted"
              : logger.describeError(err),
      });
      return undefined;
    }
  }
}
