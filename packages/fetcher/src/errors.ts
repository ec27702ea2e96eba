/**
 * Error classes for source fetching
 *
 * HttpSourceFetcher.fetch() never throws these; they are what its failure
 * observer receives.
 */

/**
 * Base error class for fetch failures
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public override readonly cause?: Error,
  ) {
    super(message);
    this.name = 'FetchError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FetchError);
    }
  }
}

/**
 * Error for a non-2xx response
 */
export class HttpStatusError extends FetchError {
  constructor(
    url: string,
    public readonly status: number,
  ) {
    super(`GET ${url} returned HTTP ${status}`, url);
    this.name = 'HttpStatusError';
  }
}

/**
 * Error for a request exceeding its time bound
 */
export class FetchTimeoutError extends FetchError {
  constructor(
    url: string,
    public readonly timeoutMs: number,
  ) {
    super(`GET ${url} timed out after ${timeoutMs}ms`, url);
    this.name = 'FetchTimeoutError';
  }
}

/**
 * Error for a request aborted by the caller
 */
export class FetchAbortedError extends FetchError {
  constructor(url: string) {
    super(`GET ${url} was aborted`, url);
    this.name = 'FetchAbortedError';
  }
}

/**
 * Error for a network or parse failure
 */
export class FetchNetworkError extends FetchError {
  constructor(url: string, cause: Error) {
    super(`GET ${url} failed: ${cause.message}`, url, cause);
    this.name = 'FetchNetworkError';
  }
}
