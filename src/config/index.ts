/**
 * Application configuration.
 * Reads typed settings from the environment (and `.env`).
 */

import {
  maybeEnv,
  optionalEnv,
  optionalEnvBool,
  optionalEnvChoice,
} from "./env.js";
import type { LogLevel } from "../logging/index.js";

export { ConfigError } from "./env.js";

// Re-export merge plan module
export * from "./plan/index.js";

export const RUN_ENVIRONMENTS = ["development", "production", "test"] as const;
export type RunEnvironment = (typeof RUN_ENVIRONMENTS)[number];

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface AppConfig {
  /** Current environment */
  readonly env: RunEnvironment;
  readonly logLevel: LogLevel;
  /** Directory the log file is written to */
  readonly logDir: string;
  readonly logToFile: boolean;
  /** Directory that merge plan file names resolve against */
  readonly dictionaryDir: string;
  /** Overrides the merge plan's output path when set */
  readonly outputFile: string | undefined;
  /** Treat missing supplementary word lists as empty instead of failing */
  readonly allowMissingSources: boolean;
}

/**
 * Load application configuration from the environment.
 * Throws ConfigError on a malformed value.
 */
export function loadConfig(): AppConfig {
  return {
    env: optionalEnvChoice("NODE_ENV", RUN_ENVIRONMENTS, "development"),
    logLevel: optionalEnvChoice("LOG_LEVEL", LOG_LEVELS, "info"),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    logToFile: optionalEnvBool("LOG_TO_FILE", true),
    dictionaryDir: optionalEnv("DICTIONARY_DIR", "dictionaries"),
    outputFile: maybeEnv("OUTPUT_FILE"),
    allowMissingSources: optionalEnvBool("ALLOW_MISSING_SOURCES", false),
  };
}
