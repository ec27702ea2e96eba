/**
 * Penn Treebank tag helpers
 */

import type { TermCategory } from '@quarry/types';

/**
 * Map a part-of-speech tag to a term category.
 * NN, NNS, NNP and NNPS are nouns; JJ, JJR and JJS are adjectives.
 */
export function categorizeTag(tag: string): TermCategory | null {
  if (tag.startsWith('NN')) return 'noun';
  if (tag.startsWith('JJ')) return 'adjective';
  return null;
}

/**
 * Whether a tag marks a word the paraphraser may substitute
 */
export function isContentTag(tag: string): boolean {
  return categorizeTag(tag) !== null;
}
