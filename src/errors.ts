/**
 * Error taxonomy.
 *
 * Only NotADirectoryError and ConfigError are fatal. The rest describe a single
 * file or directory entry and are turned into warnings where they occur.
 */

export class WordFreqError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ─── Fatal ──────────────────────────────────────────────────────────────────

export class NotADirectoryError extends WordFreqError {
  constructor(readonly path: string, cause?: unknown) {
    super(cause === undefined ? `${path} is not a directory` : `${path} is not a directory: ${describeCause(cause)}`, { cause });
  }
}

export class ConfigError extends WordFreqError {
  constructor(message: string, readonly hint?: string) {
    super(message);
  }
}

// ─── Recoverable (per entry) ────────────────────────────────────────────────

export class FileReadError extends WordFreqError {
  constructor(
    readonly path: string,
    readonly stage: "open" | "read",
    cause: unknown,
  ) {
    super(
      stage === "open"
        ? `Couldn't open ${path}: ${describeCause(cause)}`
        : `Error while reading ${path}: ${describeCause(cause)}`,
      { cause },
    );
  }
}

export class InvalidEncodingError extends WordFreqError {
  constructor(readonly path: string, cause?: unknown) {
    super(`${path} is not valid UTF-8, skipped`, { cause });
  }
}

export class EntryError extends WordFreqError {
  constructor(readonly path: string, message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${describeCause(cause)}`, { cause });
  }
}

/** Short human-readable form of an underlying error. */
function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
