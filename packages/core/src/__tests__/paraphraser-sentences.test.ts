/**
 * Sentence preservation with the natural-backed language services
 */

import { createLanguageServices } from '@quarry/language';
import { describe, it, expect } from 'vitest';

import { genericQuestion, scenarioQuestion } from '../composer/templates.js';
import { Paraphraser } from '../paraphrase/paraphraser.js';
import { SeededRandom } from '../random/seeded-random.js';

const language = createLanguageServices();

const TEXTS = [
  scenarioQuestion('Kubernetes, clusters', 'DevOps'),
  genericQuestion('DevOps'),
  'Kubernetes clusters require careful resource allocation and monitoring.',
];

function sentenceCount(text: string): number {
  return language.tokenizer.sentences(text).length;
}

describe('Paraphraser with natural', () => {
  it('should read the scenario template as two sentences', () => {
    expect(sentenceCount(scenarioQuestion('Kubernetes, clusters', 'DevOps'))).toBe(2);
  });

  it('should keep the sentence count without substitution', async () => {
    const paraphraser = new Paraphraser(language, { substitutionRate: 0, shuffleRate: 0 });

    for (const text of TEXTS) {
      const output = await paraphraser.paraphrase(text, new SeededRandom(1));
      expect(sentenceCount(output)).toBe(sentenceCount(text));
    }
  });

  it('should keep the sentence count when sentences are reordered', async () => {
    const paraphraser = new Paraphraser(language, { substitutionRate: 0, shuffleRate: 1 });
    const text = scenarioQuestion('Kubernetes, clusters', 'DevOps');

    const output = await paraphraser.paraphrase(text, new SeededRandom(4));
    expect(sentenceCount(output)).toBe(2);
  });

  it('should keep the sentence count at the default rates across seeds', async () => {
    const paraphraser = new Paraphraser(language);

    for (let seed = 1; seed <= 20; seed++) {
      for (const text of TEXTS) {
        const output = await paraphraser.paraphrase(text, new SeededRandom(seed));
        expect(sentenceCount(output)).toBe(sentenceCount(text));
      }
    }
  });
});
