/**
 * Service interface exports
 *
 * Contracts for the collaborators the generation core calls but does not
 * implement. Concrete versions live in @quarry/fetcher and @quarry/store.
 */

import type { GeneratedQuestion } from '../question/index.js';

// ============================================================================
// Source Fetcher
// ============================================================================

/**
 * Options for a single fetch
 */
export interface FetchOptions {
  /** Truncate extracted text to this many characters */
  maxChars: number;
  /** Aborts the fetch (request cancellation or timeout) */
  signal?: AbortSignal;
}

/**
 * Retrieves a page and extracts its body text
 */
export interface SourceFetcher {
  /**
   * Fetch a URL and return its extracted text.
   * Resolves to null on any network, status or parse failure.
   */
  fetch(url: string, options: FetchOptions): Promise<string | null>;
}

// ============================================================================
// Question Store
// ============================================================================

/**
 * A question as persisted by the store
 */
export interface StoredQuestion extends GeneratedQuestion {
  id: string;
  interviewId: string;
  generatedAt: string;
}

/**
 * Persists generated questions
 */
export interface QuestionStore {
  /** Create an interview for a user and return its id */
  createInterview(userId: string): Promise<string>;
  /** Whether an interview with this id exists */
  hasInterview(interviewId: string): Promise<boolean>;
  /**
   * Persist one batch as a single bulk write.
   * Rejects if the batch could not be stored.
   */
  insertBatch(records: readonly GeneratedQuestion[], interviewId: string, topic: string): Promise<void>;
  /** Questions of an interview in insertion order */
  listQuestions(interviewId: string, limit?: number): Promise<StoredQuestion[]>;
}
