/**
 * HTTP client wrapper: byte-oriented GET client using native fetch
 * Supports timeouts, caller cancellation, bounded body reads, retries with
 * exponential backoff, and structured error handling
 */

import type { HttpRequest, HttpResponse } from "@/types";
import { HttpError, isAbortError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRY_AFTER_MS,
  RETRYABLE_HTTP_METHODS,
  RETRYABLE_STATUS_CODES,
} from "@/constants/clients/http";
import * as logger from "@/logger";

let userAgent = DEFAULT_USER_AGENT;

/**
 * Replace the User-Agent sent when a request sets none
 */
export function setDefaultUserAgent(value: string): void {
  userAgent = value;
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    return undefined;
  }
}

/**
 * Read at most maxBytes of the body, then release the connection
 */
async function readBody(
  response: Response,
  maxBytes?: number,
): Promise<{ body: Uint8Array; truncated: boolean }> {
  if (maxBytes === undefined || !response.body) {
    return { body: new Uint8Array(await response.arrayBuffer()), truncated: false };
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  let truncated = false;

  while (total < maxBytes) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    chunks.push(value);
    total += value.byteLength;
  }

  if (total >= maxBytes) {
    truncated = total > maxBytes;
    await reader.cancel();
  }

  const body = new Uint8Array(Math.min(total, maxBytes));
  let offset = 0;
  for (const chunk of chunks) {
    const slice = chunk.subarray(0, body.byteLength - offset);
    body.set(slice, offset);
    offset += slice.byteLength;
    if (offset >= body.byteLength) {
      break;
    }
  }

  return { body, truncated };
}

/**
 * Check if an HTTP method is safe to retry (idempotent)
 */
function isMethodRetryable(method: string): boolean {
  return RETRYABLE_HTTP_METHODS.includes(method);
}

/**
 * Check if an HTTP status code warrants a retry
 */
function isStatusRetryable(status: number): boolean {
  return RETRYABLE_STATUS_CODES.includes(status);
}

/**
 * Check if an error is retryable
 * Returns true for network errors, timeouts, and retryable HTTP status codes
 */
function isErrorRetryable(error: unknown, req: HttpRequest): boolean {
  if (!isMethodRetryable(req.method)) {
    return false;
  }

  // A caller that cancelled does not want another attempt
  if (req.signal?.aborted) {
    return false;
  }

  if (error instanceof HttpError) {
    return isStatusRetryable(error.status);
  }

  // AbortError (timeout), TypeError (network), etc.
  if (error instanceof Error) {
    return error.name === "AbortError" || error.name === "TypeError";
  }

  return false;
}

/**
 * Parse Retry-After header value
 * Supports both delay-seconds (number) and HTTP-date formats
 * Returns delay in milliseconds, or null if invalid/missing
 */
function parseRetryAfter(retryAfterHeader: string | null): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const seconds = parseInt(retryAfterHeader, 10);
  if (!isNaN(seconds) && seconds > 0) {
    return seconds * 1000;
  }

  const date = new Date(retryAfterHeader);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - Date.now();
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

/**
 * Compute exponential backoff delay with jitter
 * Formula: min(maxDelay, baseDelay * 2^(attempt-1)) * (0.5 + random(0.5))
 */
function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

/**
 * Compute retry delay considering Retry-After header and exponential backoff
 */
function computeRetryDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  maxRetryAfterMs: number,
  retryAfterHeader: string | null,
): number {
  const retryAfterMs = parseRetryAfter(retryAfterHeader);
  if (retryAfterMs !== null) {
    return Math.min(retryAfterMs, maxRetryAfterMs);
  }

  return computeBackoffDelay(attempt, baseDelayMs, maxDelayMs);
}

/**
 * Sleep for the specified number of milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Perform a single HTTP request attempt (no retries)
 */
async function performRequest(
  req: HttpRequest,
  url: string,
  timeoutMs: number,
): Promise<HttpResponse> {
  // One controller serves both the timeout and the caller's signal
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const forwardAbort = (): void => controller.abort();
  if (req.signal?.aborted) {
    controller.abort();
  } else {
    req.signal?.addEventListener("abort", forwardAbort, { once: true });
  }

  try {
    const headers: Record<string, string> = { "User-Agent": userAgent };
    Object.assign(headers, req.headers);

    const response = await fetch(url, {
      method: req.method,
      headers,
      signal: controller.signal,
    });

    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet,
        headers: response.headers,
      });
    }

    const { body, truncated } = await readBody(response, req.maxBytes);

    return {
      status: response.status,
      statusText: response.statusText,
      url: response.url || url,
      headers: response.headers,
      body,
      truncated,
    };
  } finally {
    clearTimeout(timeoutId);
    req.signal?.removeEventListener("abort", forwardAbort);
  }
}

/**
 * Perform an HTTP request with timeout, retries, and error handling
 *
 * Retries are only performed for idempotent methods (GET) on:
 * - Network errors (no response received)
 * - Timeout errors
 * - HTTP 408 (Request Timeout)
 * - HTTP 429 (Too Many Requests) - respects Retry-After header
 * - HTTP 5xx (Server errors)
 *
 * A request whose caller signal is aborted fails immediately with an
 * AbortError and is never retried.
 *
 * @throws {HttpError} On non-2xx status codes (after all retries exhausted)
 * @throws {Error} On network errors, timeouts or cancellation
 */
export async function httpRequest(req: HttpRequest): Promise<HttpResponse> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;

  const maxAttempts = req.retry?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = req.retry?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = req.retry?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const maxRetryAfterMs = req.retry?.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await performRequest(req, req.url, timeoutMs);
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts) {
        break;
      }

      if (!isErrorRetryable(error, req)) {
        throw error;
      }

      // Extract Retry-After header if available (429 or 503)
      let retryAfterHeader: string | null = null;
      if (error instanceof HttpError && error.headers) {
        if (error.status === 429 || error.status === 503) {
          retryAfterHeader = error.headers.get("retry-after");
        }
      }

      const delayMs = computeRetryDelay(
        attempt,
        baseDelayMs,
        maxDelayMs,
        maxRetryAfterMs,
        retryAfterHeader,
      );

      logger.debug("Retrying HTTP request", {
        method: req.method,
        url: req.url,
        attempt,
        maxAttempts,
        delayMs,
        reason:
          error instanceof HttpError
            ? `status ${error.status}`
            : isAbortError(error)
              ? "timeout"
              : logger.describeError(error),
      });

      await sleep(delayMs);
    }
  }

  throw lastError;
}
