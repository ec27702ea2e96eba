/**
 * Paragraph selection
 */

import type { RandomSource } from '@quarry/types';

import { pickOne } from '../random/index.js';

/**
 * Split text into its non-blank newline-delimited paragraphs
 */
export function splitParagraphs(text: string): string[] {
  return text
    .split('\n')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/**
 * Choose one paragraph uniformly from the first `window` paragraphs.
 * Returns the whole text when it has no non-blank paragraph. Always consumes one draw.
 */
export function selectParagraph(text: string, random: RandomSource, window = 5): string {
  const candidates = splitParagraphs(text).slice(0, window);
  return pickOne(random, candidates) ?? text;
}
