/**
 * Error classes for language resources
 */

/**
 * Error thrown when a model or dictionary cannot be loaded.
 * Raised once at startup; never per request.
 */
export class LanguageResourceError extends Error {
  constructor(
    public readonly resource: string,
    public override readonly cause?: Error,
  ) {
    super(`Failed to load language resource "${resource}"${cause ? `: ${cause.message}` : ''}`);
    this.name = 'LanguageResourceError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LanguageResourceError);
    }
  }
}

/**
 * Run a resource loader, wrapping any failure
 */
export function loadResource<T>(resource: string, load: () => T): T {
  try {
    return load();
  } catch (error) {
    throw new LanguageResourceError(resource, error instanceof Error ? error : new Error(String(error)));
  }
}
