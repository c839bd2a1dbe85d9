/**
 * Error Types
 *
 * Every failure the tool reports to the user carries one of these kinds.
 * Setup errors (selection, extraction, arguments) are fatal; render failures
 * are recovered by the UI.
 */

export type ErrorKind =
  | "NoMatchingFiles"
  | "PathNotFound"
  | "NotReadable"
  | "EmptyFile"
  | "UnsupportedContent"
  | "InvalidArgument"
  | "RenderFailure";

export interface CodetypeErrorOptions {
  /** File or directory the error refers to */
  path?: string;
  /** Underlying error, if any */
  cause?: unknown;
}

export class CodetypeError extends Error {
  readonly kind: ErrorKind;
  readonly path?: string;

  constructor(kind: ErrorKind, message: string, options: CodetypeErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CodetypeError";
    this.kind = kind;
    this.path = options.path;
  }
}

export function isCodetypeError(error: unknown, kind?: ErrorKind): error is CodetypeError {
  if (!(error instanceof CodetypeError)) return false;
  return kind === undefined || error.kind === kind;
}

/**
 * Process exit code for an error that ends the program.
 * Invalid arguments exit with 2, every other failure with 1.
 */
export function exitCodeFor(error: unknown): number {
  if (isCodetypeError(error, "InvalidArgument")) return 2;
  return 1;
}

/**
 * Map a Node.js file system error onto an error kind.
 */
export function fromFsError(error: unknown, path: string, action: string): CodetypeError {
  const code = error instanceof Error && "code" in error ? error.code : undefined;

  if (code === "ENOENT" || code === "ENOTDIR") {
    return new CodetypeError("PathNotFound", `${path}: no such file or directory`, {
      path,
      cause: error,
    });
  }

  const reason = error instanceof Error ? error.message : String(error);
  return new CodetypeError("NotReadable", `${path}: cannot ${action} (${reason})`, {
    path,
    cause: error,
  });
}
