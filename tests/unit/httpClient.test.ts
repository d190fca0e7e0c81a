/**
 * Unit tests for the HTTP client
 *
 * Global fetch is stubbed; no network.
 */

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { HttpError, decodeHtmlBytes, httpRequest } from "@/clients/http";
import { DEFAULT_USER_AGENT } from "@/constants";

describe("httpRequest", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should return the body bytes and send the default User-Agent", async () => {
    fetchMock.mockResolvedValue(new Response("<title>Hi</title>", { status: 200 }));

    const response = await httpRequest({ method: "GET", url: "https://example.com/" });

    expect(new TextDecoder().decode(response.body)).toBe("<title>Hi</title>");
    expect(response.status).toBe(200);
    expect(response.truncated).toBe(false);
    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({ "User-Agent": DEFAULT_USER_AGENT });
  });

  it("should merge caller headers over the defaults", async () => {
    fetchMock.mockResolvedValue(new Response("ok"));

    await httpRequest({
      method: "GET",
      url: "https://example.com/",
      headers: { Accept: "text/html", "User-Agent": "test-agent" },
    });

    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
      "User-Agent": "test-agent",
      Accept: "text/html",
    });
  });

  it("should stop reading at maxBytes", async () => {
    fetchMock.mockResolvedValue(new Response("abcdefghij"));

    const response = await httpRequest({
      method: "GET",
      url: "https://example.com/",
      maxBytes: 4,
    });

    expect(new TextDecoder().decode(response.body)).toBe("abcd");
  });

  it("should throw HttpError without retrying a non-retryable status", async () => {
    fetchMock.mockResolvedValue(new Response("missing", { status: 404 }));

    const error = await httpRequest({ method: "GET", url: "https://example.com/x" }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toHaveProperty("status", 404);
    expect(error).toHaveProperty("bodySnippet", "missing");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("should retry a retryable status", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("busy", { status: 503 }))
      .mockResolvedValueOnce(new Response("ok", { status: 200 }));

    const response = await httpRequest({
      method: "GET",
      url: "https://example.com/",
      retry: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1 },
    });

    expect(new TextDecoder().decode(response.body)).toBe("ok");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("should not retry once the caller has aborted", async () => {
    fetchMock.mockRejectedValue(
      Object.assign(new Error("The operation was aborted."), { name: "AbortError" }),
    );
    const controller = new AbortController();
    controller.abort();

    const error = await httpRequest({
      method: "GET",
      url: "https://example.com/",
      signal: controller.signal,
    }).catch((err: unknown) => err);

    expect(error).toHaveProperty("name", "AbortError");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("decodeHtmlBytes", () => {
  it("should decode UTF-8", () => {
    expect(decodeHtmlBytes(new TextEncoder().encode("héllo"))).toBe("héllo");
  });

  it("should drop a multi-byte character cut at the end", () => {
    const bytes = new TextEncoder().encode("café").subarray(0, 4);

    expect(decodeHtmlBytes(bytes)).toBe("caf");
  });

  it("should fall back to Latin-1 for invalid UTF-8", () => {
    expect(decodeHtmlBytes(new Uint8Array([0x63, 0x61, 0x66, 0xe9, 0x21]))).toBe("café!");
  });
});
