/**
 * Environment variable names read by the configuration loader
 */

export const ENV = {
  LOG_LEVEL: "LOG_LEVEL",
  RULES_PATH: "RULES_PATH",
  OUTPUT_FORMAT: "OUTPUT_FORMAT",
  OUTPUT_SCOPE: "OUTPUT_SCOPE",
  MAX_CONCURRENCY: "EXTRACT_MAX_CONCURRENCY",
  ICON_ENDPOINT: "ICON_ENDPOINT",
  USER_AGENT: "HTTP_USER_AGENT",
} as const;
