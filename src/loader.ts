import { readFileSync } from "node:fs";
import { BookNotFoundError, BookReadError } from "./errors.js";

// A leading BOM is kept as U+FEFF, like any other character.
const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

/**
 * Read a book file and return its full text.
 * Throws BookNotFoundError when nothing exists at `path`, BookReadError for
 * any other failure, invalid UTF-8 included. Line endings come back as "\n"
 * whether the file used "\r\n", "\r" or "\n".
 */
export function loadBook(path: string): string {
  let bytes: Buffer;
  try {
    bytes = readFileSync(path);
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") throw new BookNotFoundError(path, e);
    throw new BookReadError(path, e);
  }

  let text: string;
  try {
    text = decoder.decode(bytes);
  } catch (e) {
    throw new BookReadError(path, e);
  }
  return text.replace(/\r\n?/g, "\n");
}
