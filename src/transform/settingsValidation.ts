/**
 * Transform settings validation
 *
 * Validates the rule storage format and normalises optional fields:
 * - `enabled` defaults to true
 * - `replacement` and `urlPrefix` default to ""
 * - `scopedGroups` defaults to []
 *
 * Validation is fail-fast: throws on the first problem with its field path.
 * Pattern syntax is NOT checked here; invalid patterns are skipped at apply
 * time and reported through validatePattern.
 */

import type {
  RuleGroup,
  ScopedRuleGroup,
  Transform,
  TransformRule,
  TransformSettings,
  TransformTarget,
} from "@/types";
import { TRANSFORM_TARGETS } from "@/constants";

/**
 * Error thrown when a settings document does not match the storage format.
 */
export class TransformSettingsValidationError extends Error {
  constructor(message: string) {
    super(`Transform settings validation failed: ${message}`);
    this.name = "TransformSettingsValidationError";
  }
}

type RawObject = Record<string, unknown>;

function isRecord(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, fieldPath: string): RawObject {
  if (!isRecord(value)) {
    throw new TransformSettingsValidationError(`${fieldPath} must be an object`);
  }
  return value;
}

function expectArray(value: unknown, fieldPath: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new TransformSettingsValidationError(
      `${fieldPath} must be an array, got ${typeof value}`,
    );
  }
  return value;
}

function expectString(value: unknown, fieldPath: string, fallback?: string): string {
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  if (typeof value !== "string") {
    throw new TransformSettingsValidationError(
      `${fieldPath} must be a string, got ${typeof value}`,
    );
  }
  return value;
}

function expectNonEmptyString(value: unknown, fieldPath: string): string {
  const text = expectString(value, fieldPath);
  if (text.trim().length === 0) {
    throw new TransformSettingsValidationError(
      `${fieldPath} cannot be empty or whitespace-only`,
    );
  }
  return text;
}

function expectBoolean(value: unknown, fieldPath: string): boolean {
  if (value === undefined) {
    return true;
  }
  if (typeof value !== "boolean") {
    throw new TransformSettingsValidationError(
      `${fieldPath} must be a boolean, got ${typeof value}`,
    );
  }
  return value;
}

function isTransformTarget(value: unknown): value is TransformTarget {
  return TRANSFORM_TARGETS.some((target) => target === value);
}

function parseTransform(value: unknown, fieldPath: string): Transform {
  const raw = expectObject(value, fieldPath);
  if (!isTransformTarget(raw.target)) {
    throw new TransformSettingsValidationError(
      `${fieldPath}.target must be one of ${TRANSFORM_TARGETS.join(", ")}, got ${String(raw.target)}`,
    );
  }
  return {
    target: raw.target,
    pattern: expectString(raw.pattern, `${fieldPath}.pattern`),
    replacement: expectString(raw.replacement, `${fieldPath}.replacement`, ""),
    enabled: expectBoolean(raw.enabled, `${fieldPath}.enabled`),
  };
}

function parseRule(value: unknown, fieldPath: string): TransformRule {
  const raw = expectObject(value, fieldPath);
  const transforms = expectArray(raw.transforms, `${fieldPath}.transforms`).map(
    (transform, index) => parseTransform(transform, `${fieldPath}.transforms[${index}]`),
  );
  return {
    name: expectString(raw.name, `${fieldPath}.name`, ""),
    urlPrefix: expectString(raw.urlPrefix, `${fieldPath}.urlPrefix`, ""),
    transforms,
    enabled: expectBoolean(raw.enabled, `${fieldPath}.enabled`),
  };
}

function parseRules(value: unknown, fieldPath: string): TransformRule[] {
  return expectArray(value, fieldPath).map((rule, index) =>
    parseRule(rule, `${fieldPath}[${index}]`),
  );
}

function parseGlobalGroup(value: unknown): RuleGroup {
  const raw = expectObject(value, "globalGroup");
  return { rules: parseRules(raw.rules, "globalGroup.rules") };
}

function parseScopedGroup(value: unknown, fieldPath: string): ScopedRuleGroup {
  const raw = expectObject(value, fieldPath);
  const scopeKey = expectNonEmptyString(raw.scopeKey, `${fieldPath}.scopeKey`);
  return {
    scopeKey,
    displayName: expectString(raw.displayName, `${fieldPath}.displayName`, scopeKey),
    enabled: expectBoolean(raw.enabled, `${fieldPath}.enabled`),
    rules: parseRules(raw.rules, `${fieldPath}.rules`),
  };
}

/**
 * Validate a parsed JSON document and return typed settings
 *
 * @throws {TransformSettingsValidationError} On the first structural problem
 *
 * @example
 * validateTransformSettings({ globalGroup: { rules: [] } })
 * // { globalGroup: { rules: [] }, scopedGroups: [] }
 */
export function validateTransformSettings(raw: unknown): TransformSettings {
  const root = expectObject(raw, "settings");
  const globalGroup = parseGlobalGroup(root.globalGroup);

  const scopedGroups =
    root.scopedGroups === undefined
      ? []
      : expectArray(root.scopedGroups, "scopedGroups").map((group, index) =>
          parseScopedGroup(group, `scopedGroups[${index}]`),
        );

  const seen = new Set<string>();
  for (const group of scopedGroups) {
    if (seen.has(group.scopeKey)) {
      throw new TransformSettingsValidationError(
        `Duplicate scoped group scopeKey: "${group.scopeKey}"`,
      );
    }
    seen.add(group.scopeKey);
  }

  return { globalGroup, scopedGroups };
}
