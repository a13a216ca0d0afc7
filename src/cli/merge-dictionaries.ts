#!/usr/bin/env node
/**
 * CLI command to build the combined short dictionary.
 *
 * Usage:
 *   npx tsx src/cli/merge-dictionaries.ts [options]
 *   npm run merge -- [options]
 *
 * Options:
 *   --dir <path>        Directory holding the word lists (default: $DICTIONARY_DIR or "dictionaries")
 *   --out <path>        Output file (default: $OUTPUT_FILE or <dir>/new_short_dictionary.txt)
 *   --plan <path>       JSON merge plan replacing the built-in source table
 *   --allow-missing     Treat missing supplementary word lists as empty (warns)
 *   --dry-run           Merge and report without writing the dictionary
 *   --json              Print the run report as JSON (logs go to stderr)
 *   --verbose           Log per-source detail
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - Dictionary written (or dry run completed)
 *   1 - Configuration, plan, read or write failure
 */

import { parseArgs } from "node:util";

import {
  ConfigError,
  DEFAULT_MERGE_PLAN,
  loadConfig,
  loadMergePlanFile,
  MergePlanError,
  type AppConfig,
  type MissingSourceMode,
} from "../config/index.js";
import {
  DictionaryError,
  runMerge,
  type MergeRun,
  type RejectionCounts,
} from "../dictionary/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";
import { c, formatTable, rule } from "./output.js";

// ============================================================
// Types
// ============================================================

export interface MergeCliOptions {
  dir?: string;
  out?: string;
  plan?: string;
  allowMissing: boolean;
  dryRun: boolean;
  json: boolean;
  verbose: boolean;
  help: boolean;
}

export interface MergeReportSource {
  label: string;
  file: string;
  status: "loaded" | "missing";
  linesRead: number;
  added: number;
  rejected: RejectionCounts;
  sizeAfter: number;
}

export interface MergeReport {
  runId: string;
  timestamp: string;
  output: string;
  written: boolean;
  words: number;
  sources: MergeReportSource[];
}

// ============================================================
// CLI Parsing
// ============================================================

export const USAGE = `
Usage: merge-dictionaries [options]

Options:
  --dir <path>        Directory holding the word lists (default: dictionaries)
  --out <path>        Output file (default: <dir>/new_short_dictionary.txt)
  --plan <path>       JSON merge plan replacing the built-in source table
  --allow-missing     Treat missing supplementary word lists as empty (warns)
  --dry-run           Merge and report without writing the dictionary
  --json              Print the run report as JSON (logs go to stderr)
  --verbose           Log per-source detail
  -h, --help          Show this help message
`;

/**
 * @throws TypeError on unknown options or a missing option value
 */
export function parseCliArgs(args: string[]): MergeCliOptions {
  const { values } = parseArgs({
    args,
    options: {
      dir: { type: "string" },
      out: { type: "string" },
      plan: { type: "string" },
      "allow-missing": { type: "boolean", default: false },
      "dry-run": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  return {
    dir: values.dir,
    out: values.out,
    plan: values.plan,
    allowMissing: values["allow-missing"] ?? false,
    dryRun: values["dry-run"] ?? false,
    json: values.json ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}

// ============================================================
// Report
// ============================================================

export function buildMergeReport(
  run: MergeRun,
  runId: string,
  now: Date = new Date()
): MergeReport {
  return {
    runId,
    timestamp: now.toISOString(),
    output: run.outputPath,
    written: run.written,
    words: run.wordCount,
    sources: run.result.reports.map((r) => ({
      label: r.label,
      file: r.file,
      status: r.status,
      linesRead: r.linesRead,
      added: r.added,
      rejected: r.rejected,
      sizeAfter: r.sizeAfter,
    })),
  };
}

export function formatMergeReport(report: MergeReport): string[] {
  const rows = report.sources.map((s) => [
    s.label,
    s.status === "missing" ? "missing" : String(s.linesRead),
    String(s.added),
    String(s.rejected.too_short + s.rejected.non_alphabetic),
    String(s.sizeAfter),
  ]);

  const lines = [
    "",
    rule("═"),
    " Dictionary merge",
    rule("═"),
    "",
    ...formatTable(["source", "lines", "added", "rejected", "total"], rows),
    "",
    rule(),
  ];

  lines.push(
    report.written
      ? `Wrote ${report.words} words to ${report.output}`
      : `Dry run: ${report.words} words (not written to ${report.output})`
  );
  lines.push(rule(), "");
  return lines;
}

// ============================================================
// Main
// ============================================================

function describeError(err: unknown): string {
  if (err instanceof DictionaryError || err instanceof MergePlanError) {
    return err.format();
  }
  return err instanceof Error ? err.message : String(err);
}

function run(
  options: MergeCliOptions,
  config: AppConfig,
  logger: Logger,
  runId: string
): number {
  const missingSources: MissingSourceMode =
    options.allowMissing || config.allowMissingSources ? "warn" : "fail";
  const plan = options.plan ? loadMergePlanFile(options.plan) : DEFAULT_MERGE_PLAN;

  const result = runMerge({
    plan,
    baseDir: options.dir ?? config.dictionaryDir,
    outputPath: options.out ?? config.outputFile,
    missingSources,
    dryRun: options.dryRun,
    logger,
  });

  const report = buildMergeReport(result, runId);
  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    for (const line of formatMergeReport(report)) {
      console.log(line);
    }
  }
  return 0;
}

function main(): void {
  let options: MergeCliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(c("red", describeError(err)));
    console.error(USAGE);
    process.exit(1);
  }

  if (options.help) {
    console.log(USAGE);
    process.exit(0);
  }

  const runId = initRunId();

  let config: AppConfig;
  let logger: Logger;
  try {
    config = loadConfig();
    logger = createLogger({
      level: options.verbose ? "debug" : config.logLevel,
      logDir: config.logDir,
      file: config.logToFile,
      consoleStream: options.json ? "stderr" : "stdout",
    });
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(c("red", `Configuration error: ${err.message}`));
      process.exit(1);
    }
    throw err;
  }

  try {
    process.exit(run(options, config, logger, runId));
  } catch (err) {
    if (err instanceof DictionaryError || err instanceof MergePlanError) {
      logger.error("Merge failed", { error: describeError(err) });
      process.exit(1);
    }
    throw err;
  }
}

const isDirectExecution = /merge-dictionaries(\.[jt]s)?$/.test(process.argv[1] ?? "");

if (isDirectExecution) {
  main();
}
