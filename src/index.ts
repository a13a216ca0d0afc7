/**
 * Entry point: builds the combined dictionary from environment configuration.
 * See src/cli/merge-dictionaries.ts for the flag-driven variant.
 */

import {
  ConfigError,
  DEFAULT_MERGE_PLAN,
  loadConfig,
  type AppConfig,
} from "./config/index.js";
import { DictionaryError, runMerge } from "./dictionary/index.js";
import { initRunId, createLogger } from "./logging/index.js";

function main(): void {
  const runId = initRunId();

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  const logger = createLogger({
    level: config.logLevel,
    logDir: config.logDir,
    file: config.logToFile,
  });

  logger.info("Dictionary merge starting", {
    runId,
    env: config.env,
    dictionaryDir: config.dictionaryDir,
  });

  try {
    const run = runMerge({
      plan: DEFAULT_MERGE_PLAN,
      baseDir: config.dictionaryDir,
      outputPath: config.outputFile,
      missingSources: config.allowMissingSources ? "warn" : "fail",
      logger,
    });
    logger.info("Dictionary merge finished", {
      output: run.outputPath,
      words: run.wordCount,
    });
  } catch (err) {
    if (err instanceof DictionaryError) {
      logger.error("Dictionary merge failed", { error: err.format() });
      process.exit(1);
    }
    throw err;
  }
}

main();
