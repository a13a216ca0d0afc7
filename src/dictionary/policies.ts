/**
 * Line normalization and acceptance policies.
 *
 * Every line goes through normalizeWord() before a policy sees it, so the
 * policies only ever deal with trimmed, upper-cased strings.
 */

import type { AcceptancePolicy } from "../config/plan/index.js";

/**
 * Supplementary words must be longer than this to be accepted.
 */
export const MIN_LENGTH_EXCLUSIVE = 4;

const UPPERCASE_ASCII = /^[A-Z]+$/;

export type RejectionReason = "empty" | "too_short" | "non_alphabetic";

export type WordVerdict =
  | { accepted: true }
  | { accepted: false; reason: RejectionReason };

const ACCEPTED: WordVerdict = { accepted: true };

/**
 * Trim surrounding whitespace (including "\r" and "\n") and upper-case.
 * Idempotent.
 */
export function normalizeWord(line: string): string {
  return line.trim().toUpperCase();
}

/**
 * True when every character is one of A-Z.
 */
export function isUppercaseAlphabetic(word: string): boolean {
  return UPPERCASE_ASCII.test(word);
}

/**
 * Apply a policy to a normalized word.
 *
 * Blank lines are rejected under both policies; a blank entry in the base
 * list would otherwise become an empty line in the output.
 */
export function checkWord(word: string, policy: AcceptancePolicy): WordVerdict {
  if (word.length === 0) {
    return { accepted: false, reason: "empty" };
  }

  switch (policy) {
    case "unconditional":
      return ACCEPTED;
    case "length_and_alphabetic":
      if (word.length <= MIN_LENGTH_EXCLUSIVE) {
        return { accepted: false, reason: "too_short" };
      }
      if (!isUppercaseAlphabetic(word)) {
        return { accepted: false, reason: "non_alphabetic" };
      }
      return ACCEPTED;
  }
}

export function acceptsWord(word: string, policy: AcceptancePolicy): boolean {
  return checkWord(word, policy).accepted;
}
