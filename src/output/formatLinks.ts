/**
 * Output formatting for (title, url) pairs
 */

import type { OutputFormat, TitleUrlPair } from "@/types";
import { escapeHtml } from "@/utils/text/htmlText";

function markdownLink(pair: TitleUrlPair): string {
  return `[${pair.title}](${pair.url})`;
}

function htmlLink(pair: TitleUrlPair): string {
  return `<a href="${escapeHtml(pair.url)}">${escapeHtml(pair.title)}</a>`;
}

/**
 * Render pairs for the clipboard/stdout collaborator
 *
 * - list:  "- [title](url)" per line
 * - plain: "[title](url)" per line
 * - html:  a single <ul> of anchors
 *
 * @example
 * formatLinks([{ title: "Docs", url: "https://example.com/docs" }], "list")
 * // "- [Docs](https://example.com/docs)"
 */
export function formatLinks(pairs: readonly TitleUrlPair[], format: OutputFormat): string {
  switch (format) {
    case "list":
      return pairs.map((pair) => `- ${markdownLink(pair)}`).join("\n");
    case "plain":
      return pairs.map(markdownLink).join("\n");
    case "html":
      return `<ul>${pairs.map((pair) => `<li>${htmlLink(pair)}</li>`).join("")}</ul>`;
  }
}
