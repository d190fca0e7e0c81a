/**
 * Built-in rule settings and migration from the legacy title options
 */

import type { LegacyTitleOptions, TransformRule, TransformSettings } from "@/types";
import { GITHUB_SUFFIX_PATTERN, GITHUB_URL_PREFIX } from "@/constants";

function stripBackticksRule(): TransformRule {
  return {
    name: "Strip backticks",
    urlPrefix: "",
    enabled: true,
    transforms: [{ target: "title", pattern: "`", replacement: "", enabled: true }],
  };
}

function githubSuffixRule(): TransformRule {
  return {
    name: "GitHub suffix",
    urlPrefix: GITHUB_URL_PREFIX,
    enabled: true,
    transforms: [
      { target: "title", pattern: GITHUB_SUFFIX_PATTERN, replacement: "", enabled: true },
    ],
  };
}

/**
 * Settings used when the user has none: strip backticks everywhere and
 * drop the " · owner/repo" suffix from GitHub titles
 */
export function defaultTransformSettings(): TransformSettings {
  return {
    globalGroup: { rules: [stripBackticksRule(), githubSuffixRule()] },
    scopedGroups: [],
  };
}

/**
 * Build settings equivalent to the legacy boolean title options
 */
export function migrateLegacyTitleOptions(options: LegacyTitleOptions): TransformSettings {
  const rules: TransformRule[] = [];
  if (options.removeBackticks) {
    rules.push(stripBackticksRule());
  }
  if (options.trimGitHubSuffix) {
    rules.push(githubSuffixRule());
  }
  return { globalGroup: { rules }, scopedGroups: [] };
}
