/**
 * Transform rule type definitions
 *
 * Mirrors the rule storage format exchanged with the preferences collaborator.
 */

import type { TRANSFORM_TARGETS } from "@/constants/transform";

/**
 * Field a transform rewrites
 */
export type TransformTarget = (typeof TRANSFORM_TARGETS)[number];

/**
 * A single regex substitution
 */
export type Transform = {
  target: TransformTarget;
  /** Regular expression source; empty means no-op */
  pattern: string;
  /** Replacement template ($0 or $& for the whole match, $1..$n, $$) */
  replacement: string;
  enabled: boolean;
};

/**
 * Ordered transforms guarded by a URL prefix
 */
export type TransformRule = {
  name: string;
  /** Literal, case-sensitive prefix; empty matches every URL */
  urlPrefix: string;
  transforms: Transform[];
  enabled: boolean;
};

export type RuleGroup = {
  rules: TransformRule[];
};

/**
 * Rule group that only applies for one destination context
 */
export type ScopedRuleGroup = RuleGroup & {
  scopeKey: string;
  displayName: string;
  enabled: boolean;
};

export type TransformSettings = {
  globalGroup: RuleGroup;
  scopedGroups: ScopedRuleGroup[];
};

/**
 * Legacy boolean title options, superseded by rule settings
 */
export type LegacyTitleOptions = {
  removeBackticks: boolean;
  trimGitHubSuffix: boolean;
};
