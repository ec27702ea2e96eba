/**
 * Question Composer
 */

import type { SalientTerm } from '@quarry/types';

import { genericQuestion, scenarioQuestion } from './templates.js';

/** Terms interpolated into the scenario template */
const INTERPOLATED_TERMS = 2;

/**
 * Turn a paragraph and its salient terms into one question.
 * Neither template quotes the paragraph itself.
 */
export function composeQuestion(
  _paragraph: string,
  topic: string,
  terms: readonly SalientTerm[],
): string {
  if (terms.length === 0) {
    return genericQuestion(topic);
  }

  const joined = terms
    .slice(0, INTERPOLATED_TERMS)
    .map((t) => t.surface)
    .join(', ');
  return scenarioQuestion(joined, topic);
}
