/**
 * Part-of-speech tagging
 */

import natural from 'natural';
import type { TaggedToken, WordTagger } from '@quarry/types';

import { loadResource } from './errors.js';

/**
 * Minimal shape of natural's Brill tagger
 */
export interface BrillTaggerLike {
  tag(tokens: string[]): { taggedWords: TaggedToken[] };
}

/**
 * Penn Treebank tagging with natural's English Brill tagger.
 * Unknown words default to NN, or NNP when capitalized.
 */
export class PennTagger implements WordTagger {
  private readonly tagger: BrillTaggerLike;

  constructor(tagger?: BrillTaggerLike) {
    this.tagger = tagger ?? loadResource('brill-tagger', createBrillTagger);
  }

  tag(tokens: string[]): TaggedToken[] {
    if (tokens.length === 0) {
      return [];
    }
    return this.tagger.tag(tokens).taggedWords.map(({ token, tag }) => ({ token, tag }));
  }
}

function createBrillTagger(): BrillTaggerLike {
  const lexicon = new natural.Lexicon('EN', 'NN', 'NNP');
  const ruleSet = new natural.RuleSet('EN');
  return new natural.BrillPOSTagger(lexicon, ruleSet);
}
