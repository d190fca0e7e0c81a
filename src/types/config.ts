/**
 * Application configuration type definitions
 */

import type { LogLevel } from "./logger";
import type { OutputFormat } from "./output";

/**
 * Runtime configuration resolved from the environment
 */
export type AppConfig = {
  logLevel: LogLevel;
  /** Rule settings file; default rules are used when absent */
  rulesPath?: string;
  outputFormat: OutputFormat;
  /** Scoped rule group applied after the global group */
  outputScope?: string;
  /** Upper bound on concurrent title fetches; unbounded when absent */
  maxConcurrency?: number;
  /** Icon lookup URL template containing "{host}" */
  iconEndpoint: string;
  userAgent: string;
};
