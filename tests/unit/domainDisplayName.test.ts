import { describe, it, expect } from "vitest";
import { domainDisplayName } from "@/utils/domain/domainDisplayName";

describe("domainDisplayName", () => {
  it("should reduce a subdomain to the apex and drop a common TLD", () => {
    expect(domainDisplayName("https://docs.github.com/en")).toBe("github");
    expect(domainDisplayName("https://www.example.org/about")).toBe("example");
  });

  it("should keep uncommon TLDs", () => {
    expect(domainDisplayName("https://web.dev/articles")).toBe("web.dev");
  });

  it("should keep two-part public suffixes whole", () => {
    expect(domainDisplayName("https://www.bbc.co.uk/news")).toBe("bbc.co.uk");
  });

  it("should return single-label hosts as they are", () => {
    expect(domainDisplayName("http://localhost:3000/")).toBe("localhost");
  });

  it("should return the input when there is no host", () => {
    expect(domainDisplayName("not a url")).toBe("not a url");
    expect(domainDisplayName("file:///tmp/page.html")).toBe("file:///tmp/page.html");
  });
});
