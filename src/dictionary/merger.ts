/**
 * Dictionary merger.
 *
 * Folds the sources of a merge plan, in order, into one set of accepted
 * words. Each step takes the previous accumulator and returns a new one;
 * nothing outside the fold holds the set while it grows.
 *
 * The first source seeds the set. A missing first source is always fatal,
 * whatever the missing-source mode, since there is nothing to merge into.
 */

import { resolve } from "node:path";
import {
  sourceLabel,
  type AcceptancePolicy,
  type MergePlan,
  type MissingSourceMode,
  type SourceEntry,
} from "../config/plan/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { FileAccessError } from "./errors.js";
import { readWordList } from "./loader.js";
import { checkWord, normalizeWord, type RejectionReason } from "./policies.js";

export type RejectionCounts = Readonly<Record<RejectionReason, number>>;

/**
 * What one source contributed to the merge.
 */
export interface SourceReport {
  readonly label: string;
  /** Resolved path of the word list */
  readonly file: string;
  readonly policy: AcceptancePolicy;
  readonly status: "loaded" | "missing";
  readonly linesRead: number;
  /** Lines that passed the policy, duplicates included */
  readonly accepted: number;
  /** Words that were not already in the set */
  readonly added: number;
  readonly rejected: RejectionCounts;
  /** Merged set size after this source */
  readonly sizeAfter: number;
}

export interface MergeResult {
  readonly words: ReadonlySet<string>;
  readonly reports: readonly SourceReport[];
}

export interface MergeOptions {
  /** Directory relative source paths resolve against (default: cwd) */
  baseDir?: string;
  /** Default "fail" */
  missingSources?: MissingSourceMode;
  logger?: Logger;
  /** Called after each source with its report */
  onProgress?: (report: SourceReport) => void;
  /** Replaces the file loader, mainly for tests */
  readLines?: (path: string) => string[];
}

/**
 * Result of running one source's lines through its policy.
 */
export interface FilteredSource {
  readonly words: readonly string[];
  readonly rejected: RejectionCounts;
}

/**
 * Normalize every line and keep those the policy accepts.
 */
export function filterLines(
  lines: readonly string[],
  policy: AcceptancePolicy
): FilteredSource {
  const words: string[] = [];
  const rejected: Record<RejectionReason, number> = {
    empty: 0,
    too_short: 0,
    non_alphabetic: 0,
  };

  for (const line of lines) {
    const word = normalizeWord(line);
    const verdict = checkWord(word, policy);
    if (verdict.accepted) {
      words.push(word);
    } else {
      rejected[verdict.reason]++;
    }
  }

  return { words, rejected };
}

/**
 * Progress line for a processed source, e.g. "After globish: 16080".
 */
export function formatProgress(report: SourceReport, isBase: boolean): string {
  return isBase
    ? `Seeded from ${report.label}: ${report.sizeAfter}`
    : `After ${report.label}: ${report.sizeAfter}`;
}

interface LoadedLines {
  lines: string[];
  status: SourceReport["status"];
}

function loadSourceLines(
  path: string,
  isBase: boolean,
  readLines: (path: string) => string[],
  missingSources: MissingSourceMode,
  logger: Logger
): LoadedLines {
  try {
    return { lines: readLines(path), status: "loaded" };
  } catch (err) {
    if (
      err instanceof FileAccessError &&
      err.isMissing &&
      !isBase &&
      missingSources === "warn"
    ) {
      logger.warn("Supplementary word list not found; contributing nothing", {
        file: path,
      });
      return { lines: [], status: "missing" };
    }
    throw err;
  }
}

/**
 * Merge all sources of a plan into one word set.
 *
 * @throws FileAccessError, EncodingError from the loader
 */
export function mergeSources(
  plan: Pick<MergePlan, "sources">,
  options: MergeOptions = {}
): MergeResult {
  const {
    baseDir = ".",
    missingSources = "fail",
    logger = silentLogger,
    onProgress,
    readLines = readWordList,
  } = options;

  const initial: MergeResult = { words: new Set<string>(), reports: [] };

  const merged = plan.sources.reduce<MergeResult>(
    (acc: MergeResult, source: SourceEntry, index: number): MergeResult => {
      const isBase = index === 0;
      const path = resolve(baseDir, source.file);
      const { lines, status } = loadSourceLines(
        path,
        isBase,
        readLines,
        missingSources,
        logger
      );
      const filtered = filterLines(lines, source.policy);

      const words = new Set(acc.words);
      for (const word of filtered.words) {
        words.add(word);
      }

      const report: SourceReport = {
        label: sourceLabel(source),
        file: path,
        policy: source.policy,
        status,
        linesRead: lines.length,
        accepted: filtered.words.length,
        added: words.size - acc.words.size,
        rejected: filtered.rejected,
        sizeAfter: words.size,
      };

      logger.info(formatProgress(report, isBase));
      logger.debug("Source merged", {
        file: report.file,
        linesRead: report.linesRead,
        accepted: report.accepted,
        added: report.added,
        rejected: report.rejected,
      });
      onProgress?.(report);

      return { words, reports: [...acc.reports, report] };
    },
    initial
  );

  return Object.freeze({
    words: merged.words,
    reports: Object.freeze([...merged.reports]),
  });
}
