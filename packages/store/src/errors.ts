/**
 * Error classes for store operations
 */

/**
 * Base error class for store errors
 */
export class StoreError extends Error {
  constructor(
    message: string,
    public readonly dbPath?: string,
  ) {
    super(message);
    this.name = 'StoreError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StoreError);
    }
  }
}

/**
 * Error thrown when the database cannot be opened
 */
export class ConnectionError extends StoreError {
  constructor(dbPath: string, cause?: Error) {
    super(`Failed to open question store at ${dbPath}${cause ? `: ${cause.message}` : ''}`, dbPath);
    this.name = 'ConnectionError';
  }
}

/**
 * Error thrown when a statement fails
 */
export class QueryError extends StoreError {
  constructor(
    public readonly operation: string,
    public override readonly cause?: Error,
  ) {
    super(`Store operation '${operation}' failed${cause ? `: ${cause.message}` : ''}`);
    this.name = 'QueryError';
  }
}

/**
 * Error thrown when an interview id is unknown
 */
export class InterviewNotFoundError extends StoreError {
  constructor(public readonly interviewId: string) {
    super(`Interview not found: ${interviewId}`);
    this.name = 'InterviewNotFoundError';
  }
}
