/**
 * Site icons fetched from an icon lookup endpoint
 */

import type { FetchOptions, HttpRequestFn, ImageFormat, SiteIcon } from "@/types";
import { DEFAULT_ICON_ENDPOINT, ICON_FETCH, ICON_HOST_PLACEHOLDER } from "@/constants";
import { httpRequest } from "@/clients/http";

/**
 * Magic numbers of the raster formats an icon endpoint may return
 */
const SIGNATURES: ReadonlyArray<{ format: ImageFormat; bytes: readonly number[] }> = [
  { format: "png", bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
  { format: "ico", bytes: [0x00, 0x00, 0x01, 0x00] },
  { format: "gif", bytes: [0x47, 0x49, 0x46, 0x38] },
  { format: "jpeg", bytes: [0xff, 0xd8, 0xff] },
  { format: "bmp", bytes: [0x42, 0x4d] },
];

const RIFF = [0x52, 0x49, 0x46, 0x46];
const WEBP = [0x57, 0x45, 0x42, 0x50];

function startsWithBytes(data: Uint8Array, bytes: readonly number[], offset = 0): boolean {
  if (data.byteLength < offset + bytes.length) {
    return false;
  }
  return bytes.every((byte, i) => data[offset + i] === byte);
}

function looksLikeSvg(data: Uint8Array): boolean {
  const head = new TextDecoder("utf-8").decode(data.subarray(0, 512)).trimStart().toLowerCase();
  return head.startsWith("<svg") || (head.startsWith("<?xml") && head.includes("<svg"));
}

/**
 * Identify an image by its leading bytes
 *
 * @returns The format, or undefined when the bytes are not an image we know
 */
export function detectImageFormat(data: Uint8Array): ImageFormat | undefined {
  for (const signature of SIGNATURES) {
    if (startsWithBytes(data, signature.bytes)) {
      return signature.format;
    }
  }
  if (startsWithBytes(data, RIFF) && startsWithBytes(data, WEBP, 8)) {
    return "webp";
  }
  if (looksLikeSvg(data)) {
    return "svg";
  }
  return undefined;
}

/**
 * Fill the endpoint template with a host
 */
export function buildIconLookupUrl(host: string, endpoint: string = DEFAULT_ICON_ENDPOINT): string {
  return endpoint.split(ICON_HOST_PLACEHOLDER).join(encodeURIComponent(host));
}

/**
 * Host of a URL, lowercased, or undefined when it has none
 */
export function iconHostFor(url: string): string | undefined {
  if (!URL.canParse(url)) {
    return undefined;
  }
  const host = new URL(url).hostname.toLowerCase();
  return host.length > 0 ? host : undefined;
}

/**
 * Fetch and validate the icon for a host
 *
 * Non-2xx responses throw (HttpError); undecodable bytes yield undefined.
 */
export async function fetchSiteIcon(
  host: string,
  options: FetchOptions & { request?: HttpRequestFn; endpoint?: string } = {},
): Promise<SiteIcon | undefined> {
  const request = options.request ?? httpRequest;
  const response = await request({
    method: "GET",
    url: buildIconLookupUrl(host, options.endpoint),
    headers: { ...ICON_FETCH.HEADERS },
    timeoutMs: ICON_FETCH.TIMEOUT_MS,
    retry: { maxAttempts: 1 },
    signal: options.signal,
  });

  const format = detectImageFormat(response.body);
  if (!format) {
    return undefined;
  }

  const icon: SiteIcon = { host, format, data: response.body };
  const contentType = response.headers.get("content-type");
  if (contentType) {
    icon.contentType = contentType;
  }
  return icon;
}
