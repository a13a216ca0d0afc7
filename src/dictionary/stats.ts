/**
 * Dictionary statistics.
 *
 * The board solver that consumes the merged dictionary indexes words into
 * fixed buffers of MAX_SOLVER_WORD_LENGTH letters and maps each character
 * onto A-Z, so longer or non-alphabetic entries are worth flagging before a
 * dictionary ships.
 */

import { isUppercaseAlphabetic } from "./policies.js";

export const MAX_SOLVER_WORD_LENGTH = 17;

export interface LengthBucket {
  readonly length: number;
  readonly count: number;
}

export interface DictionaryStats {
  readonly total: number;
  /** 0 for an empty dictionary */
  readonly minLength: number;
  readonly maxLength: number;
  /** Ascending by length */
  readonly byLength: readonly LengthBucket[];
  /** Every word of maxLength, sorted */
  readonly longestWords: readonly string[];
  /** Count of words containing anything outside A-Z */
  readonly nonAlphabetic: number;
  /** Words longer than MAX_SOLVER_WORD_LENGTH, sorted */
  readonly overSolverLimit: readonly string[];
}

export function computeDictionaryStats(words: Iterable<string>): DictionaryStats {
  const counts = new Map<number, number>();
  const unique = new Set(words);
  let nonAlphabetic = 0;
  let maxLength = 0;
  let minLength = Number.POSITIVE_INFINITY;

  for (const word of unique) {
    counts.set(word.length, (counts.get(word.length) ?? 0) + 1);
    maxLength = Math.max(maxLength, word.length);
    minLength = Math.min(minLength, word.length);
    if (!isUppercaseAlphabetic(word)) {
      nonAlphabetic++;
    }
  }

  const sorted = [...unique].sort();

  return {
    total: unique.size,
    minLength: unique.size > 0 ? minLength : 0,
    maxLength,
    byLength: [...counts.entries()]
      .map(([length, count]) => ({ length, count }))
      .sort((a, b) => a.length - b.length),
    longestWords: unique.size > 0
      ? sorted.filter((w) => w.length === maxLength)
      : [],
    nonAlphabetic,
    overSolverLimit: sorted.filter((w) => w.length > MAX_SOLVER_WORD_LENGTH),
  };
}

/**
 * Whether the solver can take every word as-is.
 */
export function isSolverCompatible(stats: DictionaryStats): boolean {
  return stats.nonAlphabetic === 0 && stats.overSolverLimit.length === 0;
}
