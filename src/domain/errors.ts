export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class NotFoundError extends Error {
  constructor(
    readonly entity: string,
    readonly id: string,
  ) {
    super(`${entity} not found: ${id}`);
    this.name = "NotFoundError";
  }
}

/**
 * Raised when a sync is requested for a data source that already has one running.
 * Duplicate requests are rejected, never queued.
 */
export class SyncInProgressError extends Error {
  constructor(readonly dataSourceId: string) {
    super(`Data source ${dataSourceId} is already syncing.`);
    this.name = "SyncInProgressError";
  }
}

/** A data source descriptor that names something the server may not read. */
export class InvalidDescriptorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidDescriptorError";
  }
}

export type ExtractionFailureReason = "unsupported_format" | "parse_error";

export class ExtractionError extends Error {
  constructor(
    readonly reason: ExtractionFailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ExtractionError";
  }
}

export class DimensionMismatchError extends Error {
  constructor(
    readonly expected: number,
    readonly actual: number,
  ) {
    super(
      `Embedding dimension mismatch: expected ${expected}, got ${actual}. ` +
        "Changing the embedding dimension requires re-embedding every data source.",
    );
    this.name = "DimensionMismatchError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
