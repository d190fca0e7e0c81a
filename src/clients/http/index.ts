/**
 * HTTP client public API
 */

export { httpRequest, setDefaultUserAgent } from "./httpClient";
export { HttpError, isAbortError } from "./httpError";
export { decodeHtmlBytes, responseText } from "./decodeBody";
export type {
  HttpRequest,
  HttpResponse,
  HttpRequestFn,
  HttpMethod,
  HttpErrorDetails,
  HttpRetryConfig,
} from "@/types";
