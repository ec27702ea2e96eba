/**
 * Question generation types
 */

/**
 * Word category of a salient term
 */
export type TermCategory = 'noun' | 'adjective';

/**
 * A content word judged likely to anchor a useful question
 */
export interface SalientTerm {
  surface: string;
  category: TermCategory;
}

/**
 * A finished question, ready to be persisted
 */
export interface GeneratedQuestion {
  readonly topic: string;
  readonly text: string;
  /** Identifier of the source unit the question was composed from */
  readonly sourceIdentifier: string;
}

/**
 * Bounds on the number of questions per request
 */
export const QUESTION_COUNT_LIMITS = {
  min: 30,
  max: 75,
} as const;

/**
 * Caller input for one generation run
 */
export interface GenerationRequest {
  topic: string;
  /** Number of questions to produce, within QUESTION_COUNT_LIMITS */
  requestedCount: number;
  /** URLs to seed the corpus with, in priority order (may be empty) */
  seedUrls: string[];
}

/**
 * Bounds on the number of study pairs per request
 */
export const STUDY_PAIR_LIMITS = {
  min: 3,
  max: 20,
} as const;

/**
 * Caller input for a study (reading practice) run
 */
export interface StudyRequest {
  topic: string;
  /** Page to read; curated defaults for the topic are used when absent */
  url?: string;
  /** Number of question/answer pairs, within STUDY_PAIR_LIMITS */
  pairCount: number;
}

/**
 * A question with a rephrased answer block taken from its source
 */
export interface StudyPair {
  readonly topic: string;
  readonly question: string;
  readonly answer: string;
  readonly sourceIdentifier: string;
}
