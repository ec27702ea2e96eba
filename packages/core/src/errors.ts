/**
 * Error classes for question generation
 */

/**
 * Error codes for generation failures
 */
export enum GenerationErrorCode {
  /** Request failed validation before any work started */
  INVALID_REQUEST = 'INVALID_REQUEST',
  /** Seed corpus was empty when composition began */
  EMPTY_CORPUS = 'EMPTY_CORPUS',
  /** A batch flush to the question store failed */
  PERSISTENCE_FAILED = 'PERSISTENCE_FAILED',
  /** Request was cancelled by its signal */
  CANCELLED = 'CANCELLED',
  /** No source could be fetched for a study run */
  NO_SOURCES = 'NO_SOURCES',
}

/**
 * Base error class for generation failures
 */
export class GenerationError extends Error {
  constructor(
    message: string,
    public readonly code: GenerationErrorCode,
    public override readonly cause?: Error,
  ) {
    super(message);
    this.name = 'GenerationError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GenerationError);
    }
  }
}

/**
 * Error thrown when a request fails validation
 */
export class InvalidRequestError extends GenerationError {
  constructor(public readonly issues: Array<{ path: string; message: string }>) {
    const details = issues.map((i) => `${i.path || 'request'}: ${i.message}`).join('; ');
    super(`Invalid request: ${details}`, GenerationErrorCode.INVALID_REQUEST);
    this.name = 'InvalidRequestError';
  }
}

/**
 * Error thrown when composition starts without any source unit.
 * The local fallback makes this unreachable; seeing it means a strategy broke its contract.
 */
export class EmptyCorpusError extends GenerationError {
  constructor(public readonly topic: string) {
    super(`Seed corpus for "${topic}" is empty`, GenerationErrorCode.EMPTY_CORPUS);
    this.name = 'EmptyCorpusError';
  }
}

/**
 * Error thrown when a flush to the question store fails
 */
export class PersistenceError extends GenerationError {
  constructor(
    /** Records stored by earlier flushes of the same request */
    public readonly persistedCount: number,
    /** Zero-based index of the failing flush */
    public readonly batchIndex: number,
    public readonly requestedCount: number,
    cause?: Error,
  ) {
    super(
      `Failed to persist batch ${batchIndex + 1}: ${persistedCount} of ${requestedCount} questions were stored${cause ? ` (${cause.message})` : ''}`,
      GenerationErrorCode.PERSISTENCE_FAILED,
      cause,
    );
    this.name = 'PersistenceError';
  }
}

/**
 * Error thrown when a request is cancelled mid-flight
 */
export class GenerationCancelledError extends GenerationError {
  constructor(
    public readonly persistedCount: number,
    public readonly requestedCount: number,
  ) {
    super(
      `Generation cancelled after ${persistedCount} of ${requestedCount} questions were stored`,
      GenerationErrorCode.CANCELLED,
    );
    this.name = 'GenerationCancelledError';
  }
}

/**
 * Error thrown when a study run finds no readable source
 */
export class NoSourcesError extends GenerationError {
  constructor(
    public readonly topic: string,
    public readonly attempted: readonly string[],
  ) {
    super(
      `No sources could be fetched for "${topic}"${attempted.length > 0 ? ` (tried ${attempted.length} URL(s))` : ' (no URL given and no curated default)'}`,
      GenerationErrorCode.NO_SOURCES,
    );
    this.name = 'NoSourcesError';
  }
}
