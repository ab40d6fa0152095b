/**
 * Geoportal Error Types
 *
 * Every failure of the ingestion pipeline is an IngestError with a
 * discriminating `kind`. The pipeline boundary converts these into
 * structured results; nothing here is fatal to the host process.
 */

/**
 * Failure categories surfaced to the caller
 */
export const INGEST_ERROR_KINDS = [
  'UnsupportedFormat',
  'ArchiveUnreadable',
  'NoGeometryFileFound',
  'DatasetUnreadable',
  'MissingGeometry',
  'ReprojectionFailure',
] as const;

export type IngestErrorKind = (typeof INGEST_ERROR_KINDS)[number];

/**
 * Plain-data form of an IngestError, safe to serialize
 */
export interface IngestErrorInfo {
  readonly kind: IngestErrorKind;
  readonly message: string;
}

/**
 * Error raised by the archive resolver, the format drivers and the normalizer
 *
 * RECOVERY: every kind is user-recoverable by uploading a corrected file.
 * No retries are attempted.
 */
export class IngestError extends Error {
  /**
   * @param kind - Failure category
   * @param message - Human-readable message shown to the end user
   * @param options - Underlying cause, when one exists
   */
  constructor(
    public readonly kind: IngestErrorKind,
    message: string,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
    this.name = 'IngestError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, IngestError);
    }
  }

  toJSON(): IngestErrorInfo {
    return { kind: this.kind, message: this.message };
  }
}

export function isIngestError(error: unknown): error is IngestError {
  return error instanceof IngestError;
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
