/**
 * Conversion errors
 * Per-file errors are caught by the processor and recorded by the tracker;
 * only InputDirectoryError aborts a run.
 */

function messageOf(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Source file could not be read (missing, permission, invalid UTF-8)
 */
export class ReadError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to read ${path}: ${messageOf(cause)}`, { cause });
    this.name = "ReadError";
    this.path = path;
  }
}

/**
 * Source text is not syntactically valid JSON
 */
export class JsonSyntaxError extends Error {
  constructor(cause: unknown) {
    super(`Invalid JSON: ${messageOf(cause)}`, { cause });
    this.name = "JsonSyntaxError";
  }
}

/**
 * Destination file or its parent directory could not be created or written
 */
export class WriteError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to write ${path}: ${messageOf(cause)}`, { cause });
    this.name = "WriteError";
    this.path = path;
  }
}

export class InputDirectoryError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Input directory not found: ${path}`);
    this.name = "InputDirectoryError";
    this.path = path;
  }
}
