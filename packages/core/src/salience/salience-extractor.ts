/**
 * Salience Extractor
 *
 * Picks the content words of a paragraph that a question can be anchored on.
 * Ranking is strictly by first occurrence.
 */

import type { SalientTerm, TextTokenizer, WordTagger } from '@quarry/types';

import { categorizeTag } from './tag-categories.js';

/**
 * Extraction limits
 */
export interface SalienceConfig {
  /** Maximum number of terms returned (default 3) */
  maxTerms?: number;
  /** Minimum surface length in characters (default 4) */
  minTermLength?: number;
}

const DEFAULT_SALIENCE_CONFIG: Required<SalienceConfig> = {
  maxTerms: 3,
  minTermLength: 4,
};

/**
 * Extracts salient nouns and adjectives from paragraphs
 */
export class SalienceExtractor {
  private readonly config: Required<SalienceConfig>;

  constructor(
    private readonly tokenizer: TextTokenizer,
    private readonly tagger: WordTagger,
    config: SalienceConfig = {},
  ) {
    this.config = { ...DEFAULT_SALIENCE_CONFIG, ...config };
  }

  /**
   * Extract up to maxTerms terms in first-occurrence order
   */
  extractTerms(paragraph: string): SalientTerm[] {
    if (paragraph.trim().length === 0) {
      return [];
    }

    const tagged = this.tagger.tag(this.tokenizer.words(paragraph));
    const seen = new Set<string>();
    const terms: SalientTerm[] = [];

    for (const { token, tag } of tagged) {
      const category = categorizeTag(tag);
      if (category === null || token.length < this.config.minTermLength) continue;
      if (seen.has(token)) continue;

      seen.add(token);
      terms.push({ surface: token, category });
      if (terms.length >= this.config.maxTerms) break;
    }

    return terms;
  }
}
