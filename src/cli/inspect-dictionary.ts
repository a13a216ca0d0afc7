#!/usr/bin/env node
/**
 * CLI command to report statistics about a dictionary file and check that
 * the board solver can take it.
 *
 * Usage:
 *   npx tsx src/cli/inspect-dictionary.ts [file] [options]
 *
 * Arguments:
 *   file                Dictionary to inspect (default: <DICTIONARY_DIR>/new_short_dictionary.txt)
 *
 * Options:
 *   --json              Output the statistics as JSON
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - Every word is A-Z and within the solver's length limit
 *   1 - Unreadable file, or words the solver cannot use
 */

import { join } from "node:path";
import { parseArgs } from "node:util";

import { ConfigError, MERGED_DICTIONARY_FILE, loadConfig } from "../config/index.js";
import {
  DictionaryError,
  MAX_SOLVER_WORD_LENGTH,
  computeDictionaryStats,
  isSolverCompatible,
  loadDictionary,
  type DictionaryStats,
} from "../dictionary/index.js";
import { c, formatTable, rule } from "./output.js";

export interface InspectCliOptions {
  file?: string;
  json: boolean;
  help: boolean;
}

export const USAGE = `
Usage: inspect-dictionary [file] [options]

Options:
  --json              Output the statistics as JSON
  -h, --help          Show this help message
`;

/** Longest-word samples printed before eliding the rest */
const MAX_LISTED_WORDS = 10;

export function parseCliArgs(args: string[]): InspectCliOptions {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (positionals.length > 1) {
    throw new TypeError(`Expected at most one dictionary file, got ${positionals.length}`);
  }

  return {
    file: positionals[0],
    json: values.json ?? false,
    help: values.help ?? false,
  };
}

function listWords(words: readonly string[]): string {
  if (words.length <= MAX_LISTED_WORDS) {
    return words.join(", ");
  }
  const shown = words.slice(0, MAX_LISTED_WORDS).join(", ");
  return `${shown} (+${words.length - MAX_LISTED_WORDS} more)`;
}

export function formatStats(path: string, stats: DictionaryStats): string[] {
  const lines = [
    "",
    rule("═"),
    ` ${path}`,
    rule("═"),
    "",
    `  Words:            ${stats.total}`,
    `  Shortest:         ${stats.minLength}`,
    `  Longest:          ${stats.maxLength}`,
  ];

  if (stats.longestWords.length > 0) {
    lines.push(`  Longest words:    ${listWords(stats.longestWords)}`);
  }

  lines.push("");
  const rows = stats.byLength.map((b) => [String(b.length), String(b.count)]);
  for (const row of formatTable(["length", "words"], rows)) {
    lines.push(`  ${row}`);
  }
  lines.push("");

  if (stats.nonAlphabetic > 0) {
    lines.push(c("red", `✗ ${stats.nonAlphabetic} word(s) contain characters outside A-Z`));
  }
  if (stats.overSolverLimit.length > 0) {
    lines.push(
      c(
        "red",
        `✗ ${stats.overSolverLimit.length} word(s) longer than ${MAX_SOLVER_WORD_LENGTH} letters: ${listWords(stats.overSolverLimit)}`
      )
    );
  }
  if (isSolverCompatible(stats)) {
    lines.push(c("green", "✓ Dictionary is usable by the board solver"));
  }
  lines.push("");
  return lines;
}

function main(): void {
  let options: InspectCliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(c("red", err instanceof Error ? err.message : String(err)));
    console.error(USAGE);
    process.exit(1);
  }

  if (options.help) {
    console.log(USAGE);
    process.exit(0);
  }

  try {
    const path = options.file ?? join(loadConfig().dictionaryDir, MERGED_DICTIONARY_FILE);
    const stats = computeDictionaryStats(loadDictionary(path));

    if (options.json) {
      console.log(JSON.stringify({ file: path, ...stats }, null, 2));
    } else {
      for (const line of formatStats(path, stats)) {
        console.log(line);
      }
    }
    process.exit(isSolverCompatible(stats) ? 0 : 1);
  } catch (err) {
    if (err instanceof DictionaryError) {
      console.error(c("red", err.format()));
      process.exit(1);
    }
    if (err instanceof ConfigError) {
      console.error(c("red", `Configuration error: ${err.message}`));
      process.exit(1);
    }
    throw err;
  }
}

const isDirectExecution = /inspect-dictionary(\.[jt]s)?$/.test(process.argv[1] ?? "");

if (isDirectExecution) {
  main();
}
