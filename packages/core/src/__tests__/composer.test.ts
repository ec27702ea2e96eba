import { createConstantRandom, createSequenceRandom } from '@quarry/test-utils';
import { describe, it, expect } from 'vitest';

import { selectParagraph, splitParagraphs } from '../composer/paragraph-selector.js';
import { composeQuestion } from '../composer/question-composer.js';
import { fallbackParagraph, genericQuestion } from '../composer/templates.js';

describe('composeQuestion', () => {
  it('should interpolate the first two terms into the scenario template', () => {
    const question = composeQuestion('ignored', 'Kubernetes', [
      { surface: 'Kubernetes', category: 'noun' },
      { surface: 'clusters', category: 'noun' },
      { surface: 'resource', category: 'noun' },
    ]);

    expect(question).toBe(
      'In a production scenario involving Kubernetes, clusters, what are the top non-obvious ' +
        'trade-offs you would evaluate, and how would you mitigate the top two risks? ' +
        '(Tie it into Kubernetes context.)',
    );
  });

  it('should use a single term on its own', () => {
    const question = composeQuestion('ignored', 'Cloud', [{ surface: 'elastic', category: 'adjective' }]);
    expect(question).toContain('involving elastic, what are');
  });

  it('should fall back to the generic template without terms', () => {
    expect(composeQuestion('', 'RPA', [])).toBe(
      'Describe an advanced challenge in RPA that can arise from the technology discussed in the ' +
        'source, and propose a step-by-step resolution strategy.',
    );
    expect(composeQuestion('', 'RPA', [])).toBe(genericQuestion('RPA'));
  });
});

describe('fallbackParagraph', () => {
  it('should mention the topic', () => {
    expect(fallbackParagraph('Edge Computing')).toBe(
      'This is a fallback paragraph about Edge Computing. Focus on real-world constraints, ' +
        'scaling, security, and maintainability.',
    );
  });
});

describe('paragraph selection', () => {
  const text = 'one\n\ntwo\n  three  \nfour\nfive\nsix';

  it('should split on newlines and drop blank paragraphs', () => {
    expect(splitParagraphs(text)).toEqual(['one', 'two', 'three', 'four', 'five', 'six']);
  });

  it('should only choose among the first five paragraphs', () => {
    expect(selectParagraph(text, createConstantRandom(0.99))).toBe('five');
    expect(selectParagraph(text, createConstantRandom(0))).toBe('one');
  });

  it('should honour a custom window', () => {
    expect(selectParagraph(text, createConstantRandom(0.99), 2)).toBe('two');
  });

  it('should return the whole text when there are no paragraphs', () => {
    const random = createSequenceRandom([0.4]);
    expect(selectParagraph(' \n \n', random)).toBe(' \n \n');
    expect(random.draws).toBe(1);
  });
});
