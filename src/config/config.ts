/**
 * Configuration loading
 *
 * Resolves AppConfig from environment variables (dotenv is loaded by the
 * entrypoint). Invalid values fail fast with ConfigError.
 */

import type { AppConfig, LogLevel, OutputFormat } from "@/types";
import {
  DEFAULT_ICON_ENDPOINT,
  DEFAULT_LOG_LEVEL,
  DEFAULT_USER_AGENT,
  ENV,
  ICON_HOST_PLACEHOLDER,
  OUTPUT_FORMATS,
} from "@/constants";
import { isLogLevel } from "@/logger";

export class ConfigError extends Error {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

/**
 * Trimmed value, or undefined when unset/blank
 */
function readVar(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function parseLogLevel(env: Env): LogLevel {
  const value = readVar(env, ENV.LOG_LEVEL)?.toLowerCase();
  if (value === undefined) {
    return DEFAULT_LOG_LEVEL;
  }
  if (!isLogLevel(value)) {
    throw new ConfigError(`${ENV.LOG_LEVEL} must be debug, info, warn or error, got "${value}"`);
  }
  return value;
}

function parseOutputFormat(env: Env): OutputFormat {
  const value = readVar(env, ENV.OUTPUT_FORMAT)?.toLowerCase();
  if (value === undefined) {
    return "list";
  }
  if (!isOutputFormat(value)) {
    throw new ConfigError(
      `${ENV.OUTPUT_FORMAT} must be one of ${OUTPUT_FORMATS.join(", ")}, got "${value}"`,
    );
  }
  return value;
}

function parseMaxConcurrency(env: Env): number | undefined {
  const value = readVar(env, ENV.MAX_CONCURRENCY);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`${ENV.MAX_CONCURRENCY} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseIconEndpoint(env: Env): string {
  const value = readVar(env, ENV.ICON_ENDPOINT);
  if (value === undefined) {
    return DEFAULT_ICON_ENDPOINT;
  }
  if (!value.includes(ICON_HOST_PLACEHOLDER)) {
    throw new ConfigError(`${ENV.ICON_ENDPOINT} must contain ${ICON_HOST_PLACEHOLDER}`);
  }
  return value;
}

/**
 * Build the runtime configuration
 *
 * @param env - Variables to read (defaults to process.env)
 * @throws {ConfigError} On any invalid value
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    logLevel: parseLogLevel(env),
    outputFormat: parseOutputFormat(env),
    iconEndpoint: parseIconEndpoint(env),
    userAgent: readVar(env, ENV.USER_AGENT) ?? DEFAULT_USER_AGENT,
  };

  const rulesPath = readVar(env, ENV.RULES_PATH);
  if (rulesPath !== undefined) {
    config.rulesPath = rulesPath;
  }
  const outputScope = readVar(env, ENV.OUTPUT_SCOPE);
  if (outputScope !== undefined) {
    config.outputScope = outputScope;
  }
  const maxConcurrency = parseMaxConcurrency(env);
  if (maxConcurrency !== undefined) {
    config.maxConcurrency = maxConcurrency;
  }

  return config;
}
