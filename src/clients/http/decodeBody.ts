/**
 * Body decoding helpers shared by every HTML fetcher
 */

import type { HttpResponse } from "@/types";

/**
 * Decode bytes as UTF-8, falling back to Latin-1 when they are not valid UTF-8
 *
 * Decoding runs in streaming mode so a multi-byte character cut at a byte
 * limit is dropped instead of failing the whole body.
 */
export function decodeHtmlBytes(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes, { stream: true });
  } catch {
    return new TextDecoder("latin1").decode(bytes);
  }
}

/**
 * Decode a response body as HTML text
 */
export function responseText(response: HttpResponse): string {
  return decodeHtmlBytes(response.body);
}
