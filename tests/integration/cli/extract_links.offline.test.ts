/**
 * Integration: extract-links command end to end (offline)
 */

import { beforeEach, describe, it, expect } from "vitest";
import { extractLinks } from "@/cli/extractLinks";
import type { AppConfig } from "@/types";
import { DEFAULT_ICON_ENDPOINT } from "@/constants";
import { createMockHttp, fixturePath } from "../../helpers/mockHttp";

const PAGE = "https://example.com/index";
const PAGE_HTML =
  `<title>Index</title>` +
  `<a href="/a">Alpha</a>` +
  `<a href="https://other.test/b">Beta</a>`;

function config(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    logLevel: "error",
    outputFormat: "list",
    iconEndpoint: DEFAULT_ICON_ENDPOINT,
    userAgent: "test-agent",
    ...overrides,
  };
}

describe("Integration: extractLinks (offline)", () => {
  const mockHttp = createMockHttp();

  beforeEach(() => {
    mockHttp.reset();
    mockHttp.onHtml(PAGE, PAGE_HTML);
    mockHttp.onHtml("https://example.com/a", "<title>Alpha | Example</title>");
    mockHttp.onHtml("https://other.test/b", "<title>`Beta` docs</title>");
  });

  it("should render resolved titles with the default rules", async () => {
    const output = await extractLinks([PAGE], config(), { request: mockHttp.request });

    expect(output).toBe(
      "- [Alpha | Example](https://example.com/a)\n- [Beta docs](https://other.test/b)",
    );
  });

  it("should apply a rules file and its scoped group", async () => {
    const output = await extractLinks(
      [PAGE],
      config({ rulesPath: fixturePath("rules/valid.json"), outputScope: "docs" }),
      { request: mockHttp.request },
    );

    expect(output).toBe(
      "- [Docs: Alpha](https://example.com/a)\n- [`Beta` docs](https://other.test/b)",
    );
  });

  it("should render HTML output", async () => {
    const output = await extractLinks([PAGE], config({ outputFormat: "html" }), {
      request: mockHttp.request,
    });

    expect(output).toBe(
      '<ul><li><a href="https://example.com/a">Alpha | Example</a></li>' +
        '<li><a href="https://other.test/b">Beta docs</a></li></ul>',
    );
  });

  it("should hand each session to the caller", async () => {
    const seen: string[] = [];

    await extractLinks([PAGE], config(), {
      request: mockHttp.request,
      onSession: (session) => seen.push(session.sourceUrl),
    });

    expect(seen).toEqual([PAGE]);
  });

  it("should fail when a page cannot be fetched", async () => {
    mockHttp.onResponse("GET", PAGE, { status: 404, body: "missing" });

    await expect(
      extractLinks([PAGE], config(), { request: mockHttp.request }),
    ).rejects.toThrow("HTTP 404 Mock Response - https://example.com/index - missing");
  });
});
