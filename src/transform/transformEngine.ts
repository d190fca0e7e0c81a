/**
 * Transform engine
 *
 * Applies ordered, URL-scoped regex rules to a (title, url) pair.
 * Pure: the result depends only on the arguments, patterns are compiled
 * per call, and no state survives between calls.
 *
 * Order of evaluation:
 * 1. global group rules, in list order
 * 2. the enabled scoped group for scopeKey (first match), in list order
 * Within a rule, enabled transforms run in list order and each one sees
 * the output of the previous one. Rule prefixes are checked against the
 * URL as rewritten so far.
 */

import type {
  RuleGroup,
  TitleUrlPair,
  Transform,
  TransformRule,
  TransformSettings,
} from "@/types";
import { TRANSFORM_REGEX_FLAGS } from "@/constants";

/**
 * Compile a pattern, or return the compile error message
 */
function compile(pattern: string): RegExp | string {
  try {
    return new RegExp(pattern, TRANSFORM_REGEX_FLAGS);
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

/**
 * Check a pattern without applying it (for editor feedback)
 *
 * @returns The compile error message, or null when the pattern is usable.
 * An empty pattern is valid (it is a no-op).
 */
export function validatePattern(pattern: string): string | null {
  if (pattern.length === 0) {
    return null;
  }
  const compiled = compile(pattern);
  return typeof compiled === "string" ? compiled : null;
}

/**
 * True when the rule's prefix is empty or a literal prefix of url
 */
export function urlMatchesPrefix(url: string, urlPrefix: string): boolean {
  return urlPrefix.length === 0 || url.startsWith(urlPrefix);
}

/**
 * Rewrite `$0` as `$&` so it stands for the whole match; `$$` stays an escaped dollar
 */
function expandReplacement(replacement: string): string {
  return replacement.replace(/\$\$|\$0(?!\d)/g, (token) => (token === "$$" ? token : "$&"));
}

/**
 * Apply one transform to a value; invalid or empty patterns leave it unchanged
 */
export function applyTransform(transform: Transform, value: string): string {
  if (transform.pattern.length === 0) {
    return value;
  }
  const compiled = compile(transform.pattern);
  if (typeof compiled === "string") {
    return value;
  }
  return value.replace(compiled, expandReplacement(transform.replacement));
}

function applyRule(rule: TransformRule, pair: TitleUrlPair): TitleUrlPair {
  let { title, url } = pair;
  for (const transform of rule.transforms) {
    if (!transform.enabled) {
      continue;
    }
    if (transform.target === "title") {
      title = applyTransform(transform, title);
    } else {
      url = applyTransform(transform, url);
    }
  }
  return { title, url };
}

function applyGroup(group: RuleGroup, pair: TitleUrlPair): TitleUrlPair {
  let current = pair;
  for (const rule of group.rules) {
    if (rule.enabled && urlMatchesPrefix(current.url, rule.urlPrefix)) {
      current = applyRule(rule, current);
    }
  }
  return current;
}

/**
 * Rewrite a (title, url) pair with the configured rules
 *
 * @param pair - Title and URL as displayed
 * @param settings - Rule groups
 * @param scopeKey - Destination context; selects at most one scoped group
 * @returns The rewritten pair (the input is not mutated)
 *
 * @example
 * applyTransformRules(
 *   { title: "Fix `bug` · acme/widgets", url: "https://github.com/acme/widgets/pull/1" },
 *   defaultTransformSettings(),
 * )
 * // { title: "Fix bug", url: "https://github.com/acme/widgets/pull/1" }
 */
export function applyTransformRules(
  pair: TitleUrlPair,
  settings: TransformSettings,
  scopeKey?: string,
): TitleUrlPair {
  let current = applyGroup(settings.globalGroup, { ...pair });

  if (scopeKey !== undefined) {
    const scoped = settings.scopedGroups.find((group) => group.scopeKey === scopeKey);
    if (scoped?.enabled) {
      current = applyGroup(scoped, current);
    }
  }

  return current;
}
