/**
 * WordNet synonym lexicon
 */

import natural from 'natural';
import type { SynonymLexicon } from '@quarry/types';

import { loadResource } from './errors.js';

/**
 * Minimal shape of natural's WordNet reader
 */
export interface WordNetLike {
  lookup(word: string, callback: (results: Array<{ synonyms: string[] }>) => void): void;
}

/**
 * Synonyms from every WordNet synset of a word, memoized per lower-cased word.
 * Multi-word lemmas have their underscores replaced by spaces.
 */
export class WordNetLexicon implements SynonymLexicon {
  private readonly wordnet: WordNetLike;
  private readonly cache = new Map<string, Promise<string[]>>();

  constructor(wordnet?: WordNetLike) {
    this.wordnet = wordnet ?? loadResource('wordnet', () => new natural.WordNet());
  }

  synonyms(word: string): Promise<string[]> {
    const key = word.toLowerCase();
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const pending = new Promise<string[]>((resolve) => {
      this.wordnet.lookup(key, (results) => {
        resolve(results.flatMap((r) => r.synonyms.map((s) => s.replace(/_/g, ' '))));
      });
    });
    this.cache.set(key, pending);
    return pending;
  }

  /** Number of words looked up so far */
  get size(): number {
    return this.cache.size;
  }
}
