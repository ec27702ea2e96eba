/**
 * Default configuration values
 */

import type { QuarryConfig } from './schema.js';

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: QuarryConfig = {
  generation: {
    batchSize: 15,
    paragraphWindow: 5,
    maxTerms: 3,
    minTermLength: 4,
    defaultCount: 40,
  },
  paraphrase: {
    substitutionRate: 0.28,
    shuffleRate: 0.3,
  },
  fetch: {
    timeoutMs: 8000,
    maxChars: 2000,
    concurrency: 4,
    userAgent: 'QuarryBot/1.0',
  },
  sources: {
    curated: {},
  },
  store: {
    dbPath: 'quarry.db',
  },
  study: {
    defaultPairs: 5,
    sourceMaxChars: 4000,
    defaultSourceMaxChars: 3000,
    answerChars: 400,
  },
};
