/**
 * Paraphraser
 *
 * Lowers verbatim overlap with source and template text through sparse
 * synonym substitution on content words and occasional sentence reordering.
 * Meaning is not validated.
 */

import type { LanguageServices, RandomSource } from '@quarry/types';

import { pickOne, shuffled } from '../random/index.js';
import { isContentTag } from '../salience/index.js';

/**
 * Paraphrase probabilities
 */
export interface ParaphraseConfig {
  /** Probability of substituting a noun or adjective (default 0.28) */
  substitutionRate?: number;
  /** Probability of permuting a multi-sentence text (default 0.30) */
  shuffleRate?: number;
}

export const DEFAULT_PARAPHRASE_CONFIG: Required<ParaphraseConfig> = {
  substitutionRate: 0.28,
  shuffleRate: 0.3,
};

/**
 * Rewrites text with injected randomness
 */
export class Paraphraser {
  private readonly config: Required<ParaphraseConfig>;

  constructor(
    private readonly language: LanguageServices,
    config: ParaphraseConfig = {},
  ) {
    this.config = { ...DEFAULT_PARAPHRASE_CONFIG, ...config };
  }

  /**
   * Paraphrase a text. Deterministic for a fixed random source.
   *
   * Tokens are rejoined with single spaces, so punctuation ends up detached
   * ("word ," instead of "word,").
   */
  async paraphrase(text: string, random: RandomSource): Promise<string> {
    if (text.trim().length === 0) {
      return '';
    }

    const sentences = this.language.tokenizer.sentences(text);
    const rewritten: string[] = [];
    for (const sentence of sentences) {
      rewritten.push(await this.rewriteSentence(sentence, random));
    }

    const ordered =
      rewritten.length > 1 && random.next() < this.config.shuffleRate
        ? shuffled(random, rewritten)
        : rewritten;

    return ordered.join(' ');
  }

  private async rewriteSentence(sentence: string, random: RandomSource): Promise<string> {
    const tagged = this.language.tagger.tag(this.language.tokenizer.words(sentence));
    const out: string[] = [];

    for (const { token, tag } of tagged) {
      if (!isContentTag(tag) || random.next() >= this.config.substitutionRate) {
        out.push(token);
        continue;
      }
      out.push(await this.substitute(token, random));
    }

    return out.join(' ');
  }

  private async substitute(word: string, random: RandomSource): Promise<string> {
    const lowered = word.toLowerCase();
    const candidates = (await this.language.lexicon.synonyms(word)).filter(
      (s) => s.toLowerCase() !== lowered,
    );
    if (candidates.length === 0) {
      return word;
    }
    return pickOne(random, candidates) ?? word;
  }
}
