/**
 * Transform settings loading
 *
 * Reads a rule settings JSON file written by the preferences collaborator.
 */

import * as fs from "fs";
import * as path from "path";
import type { TransformSettings } from "@/types";
import { validateTransformSettings } from "./settingsValidation";
import { defaultTransformSettings } from "./defaultSettings";

/**
 * Load and validate settings from a JSON file
 *
 * Relative paths resolve against the current working directory.
 *
 * @throws {Error} If the file cannot be read
 * @throws {SyntaxError} If the JSON is malformed
 * @throws {TransformSettingsValidationError} If validation fails
 */
export function loadTransformSettings(filePath: string): TransformSettings {
  const resolved = path.resolve(process.cwd(), filePath);
  const jsonContent = fs.readFileSync(resolved, "utf-8");
  const raw: unknown = JSON.parse(jsonContent);
  return validateTransformSettings(raw);
}

/**
 * Settings from filePath when given, built-in defaults otherwise
 */
export function resolveTransformSettings(filePath?: string): TransformSettings {
  return filePath ? loadTransformSettings(filePath) : defaultTransformSettings();
}
