/**
 * Dictionary merge pipeline.
 *
 * Stages, in order:
 *   loader    - read a word list into raw lines
 *   policies  - normalize each line and apply the source's acceptance policy
 *   merger    - fold the plan's sources into one word set
 *   writer    - sort and write the set, one word per line
 */

export {
  DictionaryError,
  FileAccessError,
  EncodingError,
  FileWriteError,
} from "./errors.js";

export { readWordList, decodeWordList, splitLines } from "./loader.js";

export {
  normalizeWord,
  checkWord,
  acceptsWord,
  isUppercaseAlphabetic,
  MIN_LENGTH_EXCLUSIVE,
  type RejectionReason,
  type WordVerdict,
} from "./policies.js";

export {
  mergeSources,
  filterLines,
  formatProgress,
  type MergeOptions,
  type MergeResult,
  type SourceReport,
  type FilteredSource,
  type RejectionCounts,
} from "./merger.js";

export { writeWordList, serializeWordList, sortWords, compareCodePoints } from "./writer.js";

export {
  runMerge,
  loadDictionary,
  resolveOutputPath,
  assertOutputIsNotSource,
  type RunMergeOptions,
  type MergeRun,
} from "./pipeline.js";

export {
  computeDictionaryStats,
  isSolverCompatible,
  MAX_SOLVER_WORD_LENGTH,
  type DictionaryStats,
  type LengthBucket,
} from "./stats.js";
