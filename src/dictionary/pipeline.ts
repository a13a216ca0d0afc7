/**
 * End-to-end merge run: load every source, merge, then write once.
 */

import { resolve } from "node:path";
import {
  DEFAULT_MERGE_PLAN,
  loadMergePlan,
  MergePlanError,
  type MergePlan,
} from "../config/plan/index.js";
import { silentLogger } from "../logging/index.js";
import { readWordList } from "./loader.js";
import { filterLines, mergeSources, type MergeOptions, type MergeResult } from "./merger.js";
import { writeWordList } from "./writer.js";

export interface RunMergeOptions extends MergeOptions {
  /** Default: DEFAULT_MERGE_PLAN */
  plan?: MergePlan;
  /** Overrides plan.output; resolved against the cwd rather than baseDir */
  outputPath?: string;
  /** Merge and report without writing the output */
  dryRun?: boolean;
}

export interface MergeRun {
  readonly result: MergeResult;
  /** Resolved output path */
  readonly outputPath: string;
  readonly written: boolean;
  readonly wordCount: number;
}

export function resolveOutputPath(
  plan: Pick<MergePlan, "output">,
  baseDir: string,
  override?: string
): string {
  return override !== undefined ? resolve(override) : resolve(baseDir, plan.output);
}

/**
 * Refuse an output path that resolves onto one of the plan's sources.
 *
 * @throws MergePlanError naming the first source the output would replace
 */
export function assertOutputIsNotSource(
  plan: Pick<MergePlan, "sources">,
  baseDir: string,
  outputPath: string
): void {
  const index = plan.sources.findIndex(
    (source) => resolve(baseDir, source.file) === outputPath
  );
  const source = plan.sources[index];
  if (source === undefined) {
    return;
  }
  throw new MergePlanError("Output path would overwrite a source", [
    {
      path: ["output"],
      message: `Output "${outputPath}" is the same file as sources.${index} ("${source.file}")`,
      code: "output_is_source",
    },
  ]);
}

/**
 * Merge the plan's sources and write the combined dictionary.
 *
 * Any failure aborts the run before the write, so an existing output file is
 * only ever replaced by a complete dictionary.
 */
export function runMerge(options: RunMergeOptions = {}): MergeRun {
  const { plan: rawPlan = DEFAULT_MERGE_PLAN, outputPath: override, dryRun = false } = options;
  const logger = options.logger ?? silentLogger;
  const baseDir = options.baseDir ?? ".";

  const plan = loadMergePlan(rawPlan);
  const outputPath = resolveOutputPath(plan, baseDir, override);
  assertOutputIsNotSource(plan, baseDir, outputPath);

  logger.info("Merging word lists", {
    sources: plan.sources.length,
    baseDir: resolve(baseDir),
    missingSources: options.missingSources ?? "fail",
  });

  const result = mergeSources(plan, { ...options, baseDir, logger });

  if (dryRun) {
    logger.info("Dry run; dictionary not written", {
      output: outputPath,
      words: result.words.size,
    });
    return { result, outputPath, written: false, wordCount: result.words.size };
  }

  const wordCount = writeWordList(outputPath, result.words);
  logger.info("Dictionary written", { output: outputPath, words: wordCount });

  return { result, outputPath, written: true, wordCount };
}

/**
 * Read a finished dictionary back into a set, taking every non-blank line.
 */
export function loadDictionary(path: string): ReadonlySet<string> {
  return new Set(filterLines(readWordList(path), "unconditional").words);
}
