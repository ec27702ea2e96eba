/**
 * Sentence and word tokenization
 */

import natural from 'natural';
import type { TextTokenizer } from '@quarry/types';

import { loadResource } from './errors.js';

const CLOSING_TOKEN = /^[\])}>"'`]+$/;
const PERIOD_BEFORE_CLOSERS = /^(.*[^.])\.([\])}>"'`]*)$/;
const PUNCTUATION_ONLY = /^[^\p{L}\p{N}]+$/u;

/**
 * Minimal shape of a natural tokenizer
 */
export interface Tokenize {
  tokenize(text: string): string[];
}

/**
 * Splits text with natural's sentence and Penn Treebank word tokenizers
 */
export class TreebankTokenizer implements TextTokenizer {
  private readonly sentenceTokenizer: Tokenize;
  private readonly wordTokenizer: Tokenize;

  constructor(sentenceTokenizer?: Tokenize, wordTokenizer?: Tokenize) {
    this.sentenceTokenizer =
      sentenceTokenizer ?? loadResource('sentence-tokenizer', () => new natural.SentenceTokenizer());
    this.wordTokenizer =
      wordTokenizer ?? loadResource('treebank-word-tokenizer', () => new natural.TreebankWordTokenizer());
  }

  /**
   * Non-empty trimmed sentences. Text without a sentence boundary is one sentence.
   */
  sentences(text: string): string[] {
    const trimmed = text.trim();
    if (trimmed.length === 0) {
      return [];
    }
    const sentences: string[] = [];
    for (const fragment of this.sentenceTokenizer.tokenize(trimmed)) {
      const sentence = fragment.trim();
      if (sentence.length === 0) {
        continue;
      }
      // A stray closing bracket or quote belongs to the sentence before it
      const previous = sentences.pop();
      if (previous === undefined) {
        sentences.push(sentence);
      } else if (PUNCTUATION_ONLY.test(sentence)) {
        sentences.push(`${previous} ${sentence}`);
      } else {
        sentences.push(previous, sentence);
      }
    }
    return sentences.length > 0 ? sentences : [trimmed];
  }

  words(text: string): string[] {
    if (text.trim().length === 0) {
      return [];
    }
    return splitFinalPeriod(this.wordTokenizer.tokenize(text));
  }
}

/**
 * Detach the sentence-final period from the last word when closing brackets
 * or quotes follow it: "context.)" becomes "context", ".", ")".
 */
export function splitFinalPeriod(tokens: string[]): string[] {
  let last = tokens.length - 1;
  while (last >= 0 && CLOSING_TOKEN.test(tokens[last] ?? '')) {
    last--;
  }

  const match = PERIOD_BEFORE_CLOSERS.exec(tokens[last] ?? '');
  if (!match) {
    return tokens;
  }
  const [, stem = '', closers = ''] = match;
  return [...tokens.slice(0, last), stem, '.', ...closers.split(''), ...tokens.slice(last + 1)];
}
