/**
 * Recoverable conversion failure. Callers decide whether to abort or report.
 */
export class QsfExportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "QsfExportError";
  }
}

/**
 * A sink was missing or already closed. Raised before anything is written.
 */
export class PreconditionError extends QsfExportError {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

export type StructuralParseReason = "MissingMetadata" | "MalformedElement" | "MalformedDocument";

/**
 * The input document cannot be turned into a Survey (or a response list).
 * No partial result is ever returned alongside it.
 */
export class StructuralParseError extends QsfExportError {
  reason: StructuralParseReason;
  elementIndex: number | null;
  elementTag: string | null;

  constructor(
    reason: StructuralParseReason,
    message: string,
    details: { elementIndex?: number; elementTag?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = "StructuralParseError";
    this.reason = reason;
    this.elementIndex = details.elementIndex ?? null;
    this.elementTag = details.elementTag ?? null;
  }
}

export class StreamIOError extends QsfExportError {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = "StreamIOError";
  }
}

/**
 * Two answers landed on the same normalized key. This usually means a
 * loop-and-merge configuration the normalizer does not understand.
 *
 * Not a QsfExportError: it is meant to stop the run, not to be handled.
 */
export class DataIntegrityError extends Error {
  key: string;
  rawKey: string;
  existing: string;
  incoming: string;

  constructor(key: string, rawKey: string, existing: string, incoming: string) {
    super(`cannot add '${incoming}' for '${rawKey}': key '${key}' already holds '${existing}'`);
    this.name = "DataIntegrityError";
    this.key = key;
    this.rawKey = rawKey;
    this.existing = existing;
    this.incoming = incoming;
  }
}

/**
 * Format any thrown value as a single readable line.
 */
export function formatError(error: unknown): string {
  if (error instanceof StructuralParseError) {
    const where =
      error.elementIndex !== null ? ` (element ${error.elementIndex}${error.elementTag ? ` ${error.elementTag}` : ""})` : "";
    return `${error.reason}: ${error.message}${where}`;
  }

  if (error instanceof Error) {
    return error.message || error.name;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unexpected error occurred";
}
