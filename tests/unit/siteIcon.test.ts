import { beforeEach, describe, it, expect } from "vitest";
import {
  buildIconLookupUrl,
  detectImageFormat,
  fetchSiteIcon,
  iconHostFor,
} from "@/enrichment/siteIcon";
import { createMockHttp } from "../helpers/mockHttp";

const PNG = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x01]);

describe("detectImageFormat", () => {
  it("should recognise raster signatures", () => {
    expect(detectImageFormat(PNG)).toBe("png");
    expect(detectImageFormat(new Uint8Array([0x00, 0x00, 0x01, 0x00, 0x01]))).toBe("ico");
    expect(detectImageFormat(new TextEncoder().encode("GIF89a"))).toBe("gif");
    expect(detectImageFormat(new Uint8Array([0xff, 0xd8, 0xff, 0xe0]))).toBe("jpeg");
    expect(detectImageFormat(new Uint8Array([0x42, 0x4d, 0x00]))).toBe("bmp");
  });

  it("should recognise WebP by its RIFF container", () => {
    const webp = new Uint8Array([
      0x52, 0x49, 0x46, 0x46, 0x00, 0x00, 0x00, 0x00, 0x57, 0x45, 0x42, 0x50,
    ]);
    expect(detectImageFormat(webp)).toBe("webp");
  });

  it("should recognise SVG text", () => {
    expect(detectImageFormat(new TextEncoder().encode('  <svg xmlns="x"></svg>'))).toBe("svg");
    expect(
      detectImageFormat(new TextEncoder().encode('<?xml version="1.0"?><svg></svg>')),
    ).toBe("svg");
  });

  it("should reject anything else", () => {
    expect(detectImageFormat(new TextEncoder().encode("<html></html>"))).toBeUndefined();
    expect(detectImageFormat(new Uint8Array([]))).toBeUndefined();
  });
});

describe("buildIconLookupUrl", () => {
  it("should fill the default endpoint", () => {
    expect(buildIconLookupUrl("example.com")).toBe(
      "https://www.google.com/s2/favicons?domain=example.com&sz=32",
    );
  });

  it("should fill a custom endpoint", () => {
    expect(buildIconLookupUrl("a.example", "https://icons.test/{host}.ico")).toBe(
      "https://icons.test/a.example.ico",
    );
  });
});

describe("iconHostFor", () => {
  it("should return the lowercased host", () => {
    expect(iconHostFor("https://Docs.Example.com/x")).toBe("docs.example.com");
  });

  it("should return undefined without a host", () => {
    expect(iconHostFor("nope")).toBeUndefined();
    expect(iconHostFor("file:///tmp/x")).toBeUndefined();
  });
});

describe("fetchSiteIcon", () => {
  const mockHttp = createMockHttp();
  const endpoint = "https://icons.test/{host}";

  beforeEach(() => {
    mockHttp.reset();
  });

  it("should return the icon bytes with their format and content type", async () => {
    mockHttp.onResponse("GET", "https://icons.test/example.com", {
      status: 200,
      body: PNG,
      headers: { "content-type": "image/png" },
    });

    const icon = await fetchSiteIcon("example.com", { request: mockHttp.request, endpoint });

    expect(icon).toEqual({
      host: "example.com",
      format: "png",
      contentType: "image/png",
      data: PNG,
    });
  });

  it("should return undefined for bytes that are not an image", async () => {
    mockHttp.onResponse("GET", "https://icons.test/example.com", {
      status: 200,
      body: "<html>not found</html>",
    });

    expect(
      await fetchSiteIcon("example.com", { request: mockHttp.request, endpoint }),
    ).toBeUndefined();
  });
});
