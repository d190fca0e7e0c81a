/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET";

/**
 * Retry configuration for HTTP requests
 */
export interface HttpRetryConfig {
  /** Maximum number of attempts (including initial request). Default from constants. */
  maxAttempts?: number;
  /** Base delay in ms for exponential backoff. Default from constants. */
  baseDelayMs?: number;
  /** Maximum delay in ms between retries. Default from constants. */
  maxDelayMs?: number;
  /** Maximum time in ms to wait for Retry-After header. Default from constants. */
  maxRetryAfterMs?: number;
}

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
  /**
   * Stop reading the body after this many bytes.
   * The connection is released as soon as the limit is reached.
   */
  maxBytes?: number;
  /** Caller-owned cancellation; an aborted request is never retried */
  signal?: AbortSignal;
}

/**
 * Raw response handed back by the client (2xx only; other statuses throw)
 */
export interface HttpResponse {
  status: number;
  statusText: string;
  url: string;
  headers: Headers;
  body: Uint8Array;
  /** True when the body was cut at `maxBytes` */
  truncated: boolean;
}

/**
 * Signature of the request function, injectable into every fetcher
 */
export type HttpRequestFn = (req: HttpRequest) => Promise<HttpResponse>;

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}
