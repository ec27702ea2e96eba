/**
 * Source unit types
 *
 * A source unit is one (identifier, text) pair in the seed corpus of a
 * generation request.
 */

/**
 * Identifier of the synthetic unit used when no source could be fetched
 */
export const LOCAL_FALLBACK_SOURCE = 'local_fallback';

/**
 * One text available for composing questions
 */
export interface SourceUnit {
  /** URL the text was fetched from, or LOCAL_FALLBACK_SOURCE */
  readonly identifier: string;
  /** Extracted body text */
  readonly text: string;
}

/**
 * Which tier of the fallback chain produced the corpus
 */
export type CorpusOrigin = 'seed-urls' | 'curated-defaults' | 'local-fallback';

/**
 * Seed corpus assembled for one request
 */
export interface SeedCorpus {
  /** Units in fetch order (never empty for generation) */
  readonly units: readonly SourceUnit[];
  /** Strategy that produced the units */
  readonly origin: CorpusOrigin;
  /** URLs that were attempted but yielded no usable text */
  readonly unavailable: readonly string[];
}
