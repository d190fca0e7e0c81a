export {
  applyTransformRules,
  applyTransform,
  validatePattern,
  urlMatchesPrefix,
} from "./transformEngine";
export { defaultTransformSettings, migrateLegacyTitleOptions } from "./defaultSettings";
export {
  validateTransformSettings,
  TransformSettingsValidationError,
} from "./settingsValidation";
export { loadTransformSettings, resolveTransformSettings } from "./settingsLoader";
