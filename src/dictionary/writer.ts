/**
 * Dictionary writer.
 *
 * The output is written to a temporary sibling and renamed into place, so a
 * failed write leaves any previous dictionary untouched.
 */

import { renameSync, rmSync, writeFileSync } from "node:fs";
import { FileWriteError, errnoCode } from "./errors.js";

/**
 * Order two strings by Unicode code point. Differs from the default sort
 * only for characters outside the Basic Multilingual Plane, which UTF-16
 * stores as surrogate pairs below U+E000.
 */
export function compareCodePoints(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length) {
    const left = a.codePointAt(i) ?? 0;
    const right = b.codePointAt(i) ?? 0;
    if (left !== right) {
      return left - right;
    }
    i += left > 0xffff ? 2 : 1;
  }
  return a.length - b.length;
}

/**
 * Members in ascending code-point order.
 */
export function sortWords(words: Iterable<string>): string[] {
  return [...words].sort(compareCodePoints);
}

/**
 * One word per line, no trailing newline.
 */
export function serializeWordList(words: Iterable<string>): string {
  return sortWords(words).join("\n");
}

/**
 * Write a word set to `path`, replacing any existing file.
 *
 * @returns Number of words written
 * @throws FileWriteError if the file cannot be created or written
 */
export function writeWordList(path: string, words: ReadonlySet<string>): number {
  const text = serializeWordList(words);
  const tempPath = `${path}.${process.pid}.tmp`;

  try {
    writeFileSync(tempPath, text, "utf-8");
    renameSync(tempPath, path);
  } catch (err) {
    rmSync(tempPath, { force: true });
    const detail = err instanceof Error ? err.message : String(err);
    throw new FileWriteError(path, errnoCode(err), detail);
  }

  return words.size;
}
