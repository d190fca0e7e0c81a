import { beforeEach, describe, it, expect } from "vitest";
import { fetchPreviewMetadata, parsePreviewMetadata } from "@/enrichment/previewMetadata";
import { HttpError } from "@/clients/http";
import { createMockHttp } from "../helpers/mockHttp";

const PAGE = "https://example.com/p/1";

describe("parsePreviewMetadata", () => {
  it("should read Open Graph fields in either attribute order", () => {
    const html =
      `<meta property="og:title" content="Widget &amp; Co">` +
      `<meta content='A small widget.' property='og:description'>` +
      `<meta property="og:image" content="/img/card.png">`;

    expect(parsePreviewMetadata(html, PAGE)).toEqual({
      title: "Widget & Co",
      description: "A small widget.",
      imageUrl: "https://example.com/img/card.png",
    });
  });

  it("should fall back to Twitter card names", () => {
    const html =
      `<meta name="twitter:title" content="Tweet title">` +
      `<meta name="twitter:image" content="https://cdn.example.com/t.png">`;

    expect(parsePreviewMetadata(html, PAGE)).toEqual({
      title: "Tweet title",
      imageUrl: "https://cdn.example.com/t.png",
    });
  });

  it("should prefer Open Graph over Twitter and the first tag over later ones", () => {
    const html =
      `<meta name="twitter:title" content="Tweet">` +
      `<meta property="og:title" content="First">` +
      `<meta property="og:title" content="Second">`;

    expect(parsePreviewMetadata(html, PAGE)?.title).toBe("First");
  });

  it("should match meta names case-insensitively", () => {
    expect(parsePreviewMetadata(`<META PROPERTY="OG:TITLE" CONTENT="Loud">`, PAGE)).toEqual({
      title: "Loud",
    });
  });

  it("should return undefined when no preview field is present", () => {
    expect(
      parsePreviewMetadata(`<meta name="description" content="plain"><title>T</title>`, PAGE),
    ).toBeUndefined();
  });
});

describe("fetchPreviewMetadata", () => {
  const mockHttp = createMockHttp();

  beforeEach(() => {
    mockHttp.reset();
  });

  it("should request the head of the page and parse it", async () => {
    mockHttp.onHtml(PAGE, `<meta property="og:title" content="Fetched">`);

    const metadata = await fetchPreviewMetadata(PAGE, { request: mockHttp.request });

    expect(metadata).toEqual({ title: "Fetched" });
    expect(mockHttp.getRecordedRequests()[0]).toMatchObject({
      headers: { Accept: "text/html", Range: "bytes=0-32767" },
      maxBytes: 32768,
      timeoutMs: 10000,
      retry: { maxAttempts: 1 },
    });
  });

  it("should propagate HTTP errors to the caller", async () => {
    mockHttp.onResponse("GET", PAGE, { status: 404, body: "missing" });

    const error = await fetchPreviewMetadata(PAGE, { request: mockHttp.request }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toHaveProperty("status", 404);
  });
});
