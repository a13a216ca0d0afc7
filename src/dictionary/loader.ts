/**
 * Word list loader.
 *
 * Reads a whole file and hands back its lines. Decoding is strict: a file
 * that is not valid UTF-8 fails the run rather than being patched with
 * replacement characters.
 */

import { readFileSync } from "node:fs";
import { EncodingError, FileAccessError, errnoCode } from "./errors.js";

/**
 * Decode raw file contents as UTF-8, dropping a leading byte order mark.
 *
 * @throws EncodingError on malformed byte sequences
 */
export function decodeWordList(bytes: Uint8Array, path: string): string {
  const decoder = new TextDecoder("utf-8", { fatal: true });
  try {
    return decoder.decode(bytes);
  } catch (err) {
    if (err instanceof TypeError) {
      throw new EncodingError(path);
    }
    throw err;
  }
}

/**
 * Split text into raw lines on LF, CRLF or a bare CR. A final line ending
 * does not start another line.
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Read a word list file into its raw lines.
 *
 * @throws FileAccessError if the file is missing or unreadable
 * @throws EncodingError if the file is not valid UTF-8
 */
export function readWordList(path: string): string[] {
  let bytes: Buffer;
  try {
    bytes = readFileSync(path);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new FileAccessError(path, errnoCode(err), detail);
  }
  return splitLines(decodeWordList(bytes, path));
}
