/**
 * Unit tests for link extraction and normalization
 *
 * Pure HTML in, canonical links out. No network.
 */

import { describe, it, expect } from "vitest";
import { normalizeLinks, scanAnchors } from "@/linkExtraction/linkNormalizer";

const BASE = "https://example.com/page";

describe("scanAnchors", () => {
  it("should find anchors regardless of attribute order and quote style", () => {
    const html =
      `<a href="/one">One</a>` +
      `<a class='x' href='/two' target="_blank">Two</a>` +
      `<A HREF="/three">Three</A>`;

    expect(scanAnchors(html)).toEqual([
      { href: "/one", innerHtml: "One" },
      { href: "/two", innerHtml: "Two" },
      { href: "/three", innerHtml: "Three" },
    ]);
  });

  it("should skip anchors with an empty or blank href", () => {
    expect(scanAnchors(`<a href="">x</a><a href="   ">y</a>`)).toEqual([]);
  });

  it("should decode entities in the href", () => {
    expect(scanAnchors(`<a href="/search?q=a&amp;b=c">S</a>`)).toEqual([
      { href: "/search?q=a&b=c", innerHtml: "S" },
    ]);
  });
});

describe("normalizeLinks", () => {
  it("should resolve relative hrefs and strip fragments and trailing slashes", () => {
    expect(normalizeLinks(`<a href="/docs/#intro">Docs</a>`, BASE)).toEqual([
      { url: "https://example.com/docs", key: "//example.com/docs", anchorText: "Docs" },
    ]);
  });

  it("should keep the root path slash", () => {
    expect(normalizeLinks(`<a href="https://example.com/">Home</a>`, BASE)).toEqual([
      { url: "https://example.com/", key: "//example.com/", anchorText: "Home" },
    ]);
  });

  it("should skip non-navigational and non-http hrefs", () => {
    const html =
      `<a href="javascript:void(0)">js</a>` +
      `<a href="mailto:a@example.com">mail</a>` +
      `<a href="tel:123">tel</a>` +
      `<a href="#top">top</a>` +
      `<a href="data:text/plain,hi">data</a>` +
      `<a href="ftp://files.example.com/x">ftp</a>`;

    expect(normalizeLinks(html, BASE)).toEqual([]);
  });

  it("should keep the first occurrence of a resource", () => {
    const html =
      `<a href="/a">First</a>` + `<a href="/b">B</a>` + `<a href="/a#again">Second</a>`;

    const links = normalizeLinks(html, BASE);

    expect(links.map((link) => link.url)).toEqual([
      "https://example.com/a",
      "https://example.com/b",
    ]);
    expect(links[0].anchorText).toBe("First");
  });

  it("should keep the first occurrence when the fragment variant comes first", () => {
    const html = `<a href="https://x.com/p#frag">A</a><a href="https://x.com/p">B</a>`;

    expect(normalizeLinks(html, BASE)).toEqual([
      { url: "https://x.com/p", key: "//x.com/p", anchorText: "A" },
    ]);
  });

  it("should upgrade a stored http link in place when an https duplicate follows", () => {
    const html =
      `<a href="http://example.com/a">First</a>` +
      `<a href="/b">B</a>` +
      `<a href="https://example.com/a">Second</a>`;

    expect(normalizeLinks(html, BASE)).toEqual([
      { url: "https://example.com/a", key: "//example.com/a", anchorText: "First" },
      { url: "https://example.com/b", key: "//example.com/b", anchorText: "B" },
    ]);
  });

  it("should not downgrade an https link when an http duplicate follows", () => {
    const html = `<a href="https://example.com/a">S</a><a href="http://example.com/a">P</a>`;

    expect(normalizeLinks(html, BASE)).toEqual([
      { url: "https://example.com/a", key: "//example.com/a", anchorText: "S" },
    ]);
  });

  it("should turn nested markup into collapsed display text", () => {
    const html = `<a href="/n"><span>Nested <b>bold</b></span>\n   &amp; more</a>`;

    expect(normalizeLinks(html, BASE)[0].anchorText).toBe("Nested bold & more");
  });

  it("should omit anchor text when nothing visible remains", () => {
    const [link] = normalizeLinks(`<a href="/img"><img src="x.png"></a>`, BASE);

    expect(link.url).toBe("https://example.com/img");
    expect(link).not.toHaveProperty("anchorText");
  });

  it("should return an empty list for an invalid base URL", () => {
    const html = `<a href="https://example.com/z">Z</a><a href="/rel">Rel</a>`;

    expect(normalizeLinks(html, "not a url")).toEqual([]);
  });

  it("should return an empty list for a page without anchors", () => {
    expect(normalizeLinks("<p>No links here</p>", BASE)).toEqual([]);
  });
});
