export type SnapshotErrorCode =
  | "VALIDATION"
  | "NOT_FOUND"
  | "CONFLICT"
  | "SERIALIZATION"
  | "PARSE"
  | "HTTP";

/**
 * Base class for errors raised by the snapshot store and its collaborators.
 * `code` is stable and safe to branch on; `message` is for humans.
 */
export class SnapshotError extends Error {
  readonly code: SnapshotErrorCode;

  constructor(code: SnapshotErrorCode, message: string) {
    super(message);
    this.name = "SnapshotError";
    this.code = code;
  }
}

/** Malformed input to a persistence call: missing identifier, no resolvable bucket. */
export class ValidationError extends SnapshotError {
  constructor(message: string) {
    super("VALIDATION", message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends SnapshotError {
  readonly path: string | null;

  constructor(message: string, path: string | null = null) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
    this.path = path;
  }
}

/** The operation would destroy pre-existing data that is not a pointer. */
export class ConflictError extends SnapshotError {
  readonly path: string;

  constructor(message: string, path: string) {
    super("CONFLICT", message);
    this.name = "ConflictError";
    this.path = path;
  }
}

export class SerializationError extends SnapshotError {
  constructor(message: string) {
    super("SERIALIZATION", message);
    this.name = "SerializationError";
  }
}

export class ParseError extends SnapshotError {
  readonly path: string | null;

  constructor(message: string, path: string | null = null) {
    super("PARSE", message);
    this.name = "ParseError";
    this.path = path;
  }
}

export class HttpError extends SnapshotError {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, statusText = "") {
    super("HTTP", `HTTP ${status}${statusText ? ` ${statusText}` : ""} for ${url}`);
    this.name = "HttpError";
    this.status = status;
    this.url = url;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

export function hasErrnoCode(error: unknown, code: string): boolean {
  return isErrnoException(error) && error.code === code;
}
