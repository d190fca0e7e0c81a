import { describe, it, expect } from "vitest";
import {
  canonicalizeHref,
  isNonNavigationalHref,
  upgradeToHttps,
} from "@/linkExtraction/canonicalUrl";

describe("canonicalizeHref", () => {
  it("should resolve against the base and drop the fragment", () => {
    expect(canonicalizeHref("/docs/#intro", "https://example.com/a")).toEqual({
      url: "https://example.com/docs",
      key: "//example.com/docs",
      protocol: "https:",
    });
  });

  it("should resolve dot segments", () => {
    expect(canonicalizeHref("../x", "https://example.com/a/b/c")?.url).toBe(
      "https://example.com/a/x",
    );
  });

  it("should lowercase scheme and host but keep path case", () => {
    expect(canonicalizeHref("HTTPS://Example.COM/Path", "https://example.com/")).toEqual({
      url: "https://example.com/Path",
      key: "//example.com/Path",
      protocol: "https:",
    });
  });

  it("should give http and https the same key", () => {
    const plain = canonicalizeHref("http://example.com/p", "https://example.com/");
    const secure = canonicalizeHref("https://example.com/p", "https://example.com/");

    expect(plain?.key).toBe(secure?.key);
    expect(plain?.protocol).toBe("http:");
  });

  it("should keep the query string", () => {
    expect(canonicalizeHref("/s?q=1", "https://example.com/")?.url).toBe(
      "https://example.com/s?q=1",
    );
  });

  it("should return null for non-http schemes", () => {
    expect(canonicalizeHref("ftp://example.com/file", "https://example.com/")).toBeNull();
  });

  it("should return null for a relative href with an invalid base", () => {
    expect(canonicalizeHref("/rel", "not a url")).toBeNull();
  });
});

describe("isNonNavigationalHref", () => {
  it("should match script, mail, phone, data and fragment hrefs case-insensitively", () => {
    expect(isNonNavigationalHref("  JavaScript:alert(1)")).toBe(true);
    expect(isNonNavigationalHref("MAILTO:a@example.com")).toBe(true);
    expect(isNonNavigationalHref("tel:+100")).toBe(true);
    expect(isNonNavigationalHref("data:image/png;base64,AA")).toBe(true);
    expect(isNonNavigationalHref("#top")).toBe(true);
  });

  it("should not match page links", () => {
    expect(isNonNavigationalHref("https://example.com/")).toBe(false);
    expect(isNonNavigationalHref("/docs")).toBe(false);
  });
});

describe("upgradeToHttps", () => {
  it("should swap only the scheme", () => {
    expect(upgradeToHttps("http://example.com/x?y=1")).toBe("https://example.com/x?y=1");
  });

  it("should leave https URLs alone", () => {
    expect(upgradeToHttps("https://example.com/")).toBe("https://example.com/");
  });
});
