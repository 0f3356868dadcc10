// ─── Archive Errors ─────────────────────────────────────────────────────────
//
// One error class per failure kind. Callers branch on `kind` (or instanceof)
// to tell a missing system apart from a dropped connection or a bad download.
// ─────────────────────────────────────────────────────────────────────────────

export type ArchiveErrorKind =
  | "not_found"
  | "transport"
  | "parse"
  | "verification"
  | "format"
  | "io";

export interface ArchiveErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ArchiveError extends Error {
  readonly kind: ArchiveErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(message: string, kind: ArchiveErrorKind, options: ArchiveErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.kind = kind;
    this.details = options.details;
  }
}

/** Unknown system or game name. */
export class NotFoundError extends ArchiveError {
  constructor(message: string, options: ArchiveErrorOptions = {}) {
    super(message, "not_found", options);
  }
}

/** Network or HTTP failure while fetching a page or a file. */
export class TransportError extends ArchiveError {
  readonly url?: string;
  readonly status?: number;

  constructor(
    message: string,
    options: ArchiveErrorOptions & { url?: string; status?: number } = {}
  ) {
    super(message, "transport", options);
    this.url = options.url;
    this.status = options.status;
  }
}

/** Page content did not have the expected structure. */
export class ParseError extends ArchiveError {
  constructor(message: string, options: ArchiveErrorOptions = {}) {
    super(message, "parse", options);
  }
}

export interface VerificationMismatch {
  expectedSize: number;
  actualSize: number;
  expectedChecksum: string;
  actualChecksum: string;
}

/** Downloaded bytes do not match the declared size or checksum. */
export class VerificationError extends ArchiveError {
  readonly mismatch: VerificationMismatch;

  constructor(message: string, mismatch: VerificationMismatch) {
    super(message, "verification", { details: { ...mismatch } });
    this.mismatch = mismatch;
  }
}

/** Malformed snapshot, configuration value or search pattern. */
export class FormatError extends ArchiveError {
  readonly field?: string;

  constructor(message: string, options: ArchiveErrorOptions & { field?: string } = {}) {
    super(message, "format", options);
    this.field = options.field;
  }
}

/** Wrap anything thrown into an ArchiveError, keeping archive errors as they are. */
export function toArchiveError(error: unknown): ArchiveError {
  if (error instanceof ArchiveError) return error;
  return new ArchiveError(formatErrorMessage(error), "io", { cause: error });
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const message = error.message || error.name || "Error";
    return collapseWhitespace(message);
  }
  if (error === null || error === undefined) {
    return "unknown error";
  }
  return collapseWhitespace(String(error));
}

function collapseWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}
