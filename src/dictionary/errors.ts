/**
 * Errors raised by the dictionary pipeline.
 *
 * None of these are recovered from inside the pipeline. They carry the file
 * path involved so entry points can report them and exit.
 */

export abstract class DictionaryError extends Error {
  public readonly path: string;
  /** Node error code (ENOENT, EACCES, ...) when the failure came from fs */
  public readonly code: string | undefined;

  constructor(message: string, path: string, code?: string) {
    super(message);
    this.path = path;
    this.code = code;
  }

  format(): string {
    return this.code
      ? `${this.name}: ${this.message} [${this.code}]`
      : `${this.name}: ${this.message}`;
  }
}

/**
 * An input word list is missing or cannot be read.
 */
export class FileAccessError extends DictionaryError {
  constructor(path: string, code?: string, detail?: string) {
    super(`Cannot read word list ${path}${detail ? `: ${detail}` : ""}`, path, code);
    this.name = "FileAccessError";
  }

  /** True when the file simply does not exist */
  get isMissing(): boolean {
    return this.code === "ENOENT";
  }
}

/**
 * An input word list is not valid UTF-8 text.
 */
export class EncodingError extends DictionaryError {
  constructor(path: string) {
    super(`Word list ${path} is not valid UTF-8`, path);
    this.name = "EncodingError";
  }
}

/**
 * The merged dictionary cannot be written.
 */
export class FileWriteError extends DictionaryError {
  constructor(path: string, code?: string, detail?: string) {
    super(`Cannot write dictionary ${path}${detail ? `: ${detail}` : ""}`, path, code);
    this.name = "FileWriteError";
  }
}

/**
 * Extract the `code` property Node attaches to fs errors.
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
