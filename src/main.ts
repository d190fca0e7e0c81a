/**
 * CLI entrypoint: extract the links of one or more pages
 *
 * Usage:
 *   npm start -- https://example.com/ [more urls...]
 *
 * Environment variables (all optional):
 *   - LOG_LEVEL: debug, info, warn or error (default info)
 *   - RULES_PATH: JSON file with transform settings
 *   - OUTPUT_FORMAT: list, plain or html (default list)
 *   - OUTPUT_SCOPE: scope key selecting a scoped rule group
 *   - EXTRACT_MAX_CONCURRENCY: bound on concurrent title fetches
 *   - ICON_ENDPOINT: icon lookup URL containing {host}
 *   - HTTP_USER_AGENT: User-Agent sent with every request
 *
 * Links go to stdout, logs to stderr.
 */

import "dotenv/config";
import { loadConfig } from "./config";
import { setDefaultUserAgent } from "./clients/http";
import { extractLinks } from "./cli/extractLinks";
import type { LinkExtractionSession } from "./linkExtraction";
import * as logger from "./logger";

async function main() {
  const config = loadConfig();
  logger.setLevel(config.logLevel);
  setDefaultUserAgent(config.userAgent);

  const urls = process.argv.slice(2);
  if (urls.length === 0) {
    console.error("Usage: page-link-extractor <url> [url...]");
    process.exit(1);
  }

  const sessions: LinkExtractionSession[] = [];
  process.once("SIGINT", () => {
    logger.warn("Interrupted, cancelling title fetches");
    sessions.forEach((session) => session.cancel());
  });

  const output = await extractLinks(urls, config, {
    onSession: (session) => sessions.push(session),
  });
  if (output.length > 0) {
    process.stdout.write(`${output}\n`);
  }
}

main().catch((error: unknown) => {
  logger.error("Fatal error", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
