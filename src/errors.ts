export type LoadErrorKind = "not_found" | "read_error";

/** Failure to load a book file */
export abstract class LoadError extends Error {
  abstract readonly kind: LoadErrorKind;
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.path = path;
  }
}

export class BookNotFoundError extends LoadError {
  readonly kind = "not_found";

  constructor(path: string, cause?: unknown) {
    super(`Book file not found: ${path}`, path, { cause });
  }
}

export class BookReadError extends LoadError {
  readonly kind = "read_error";

  constructor(path: string, cause: unknown) {
    super(`Error reading book file: ${describeCause(cause)}`, path, { cause });
  }
}

/** Bad command-line option values */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join("; "));
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function isLoadError(e: unknown): e is LoadError {
  return e instanceof LoadError;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
