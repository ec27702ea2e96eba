import { createConstantRandom, createMockLanguage } from '@quarry/test-utils';
import { describe, it, expect } from 'vitest';

import { Paraphraser } from '../paraphrase/paraphraser.js';
import { SeededRandom } from '../random/seeded-random.js';

describe('Paraphraser', () => {
  it('should return an empty string for empty input without drawing', async () => {
    const { services, lookup } = createMockLanguage();
    const paraphraser = new Paraphraser(services);
    const random = createConstantRandom(0);

    expect(await paraphraser.paraphrase('', random)).toBe('');
    expect(await paraphraser.paraphrase('  \n ', random)).toBe('');
    expect(random.draws).toBe(0);
    expect(lookup).not.toHaveBeenCalled();
  });

  it('should substitute a noun when the draw is below the substitution rate', async () => {
    const { services } = createMockLanguage({
      tags: { servers: 'NNS' },
      synonyms: { servers: ['hosts'] },
    });
    const paraphraser = new Paraphraser(services);
    const random = createConstantRandom(0);

    expect(await paraphraser.paraphrase('The servers run quickly.', random)).toBe(
      'The hosts run quickly .',
    );
    // one substitution draw and one synonym pick
    expect(random.draws).toBe(2);
  });

  it('should keep the word when the draw is at or above the substitution rate', async () => {
    const { services, lookup } = createMockLanguage({
      tags: { servers: 'NNS' },
      synonyms: { servers: ['hosts'] },
    });
    const paraphraser = new Paraphraser(services);

    expect(await paraphraser.paraphrase('The servers run quickly.', createConstantRandom(0.28))).toBe(
      'The servers run quickly .',
    );
    expect(lookup).not.toHaveBeenCalled();
  });

  it('should never substitute words outside the noun and adjective categories', async () => {
    const { services, lookup } = createMockLanguage({
      tags: { run: 'VBP', quickly: 'RB' },
      synonyms: { run: ['execute'], quickly: ['fast'] },
    });
    const paraphraser = new Paraphraser(services);
    const random = createConstantRandom(0);

    expect(await paraphraser.paraphrase('Jobs run quickly', random)).toBe('Jobs run quickly');
    expect(random.draws).toBe(0);
    expect(lookup).not.toHaveBeenCalled();
  });

  it('should ignore synonyms equal to the word regardless of case', async () => {
    const { services } = createMockLanguage({
      tags: { Cache: 'NN' },
      synonyms: { cache: ['cache', 'CACHE'] },
    });
    const paraphraser = new Paraphraser(services);
    const random = createConstantRandom(0);

    expect(await paraphraser.paraphrase('Cache', random)).toBe('Cache');
    expect(random.draws).toBe(1);
  });

  it('should permute sentences when the shuffle draw is below the shuffle rate', async () => {
    const { services } = createMockLanguage();
    const paraphraser = new Paraphraser(services);

    expect(
      await paraphraser.paraphrase('Alpha fails. Beta recovers. Gamma scales.', createConstantRandom(0)),
    ).toBe('Beta recovers . Gamma scales . Alpha fails .');
  });

  it('should keep sentence order when the shuffle draw is at or above the shuffle rate', async () => {
    const { services } = createMockLanguage();
    const paraphraser = new Paraphraser(services);

    expect(
      await paraphraser.paraphrase('Alpha fails. Beta recovers. Gamma scales.', createConstantRandom(0.3)),
    ).toBe('Alpha fails . Beta recovers . Gamma scales .');
  });

  it('should preserve the sentence count', async () => {
    const { services } = createMockLanguage({
      tags: { replicas: 'NNS', healthy: 'JJ', traffic: 'NN' },
      synonyms: { replicas: ['copies'], healthy: ['sound'], traffic: ['load'] },
    });
    const paraphraser = new Paraphraser(services);
    const input = 'Replicas stay healthy. The proxy routes traffic! Is it stable? Yes.';

    for (let seed = 1; seed <= 20; seed++) {
      const output = await paraphraser.paraphrase(input, new SeededRandom(seed));
      expect(services.tokenizer.sentences(output)).toHaveLength(4);
    }
  });

  it('should be deterministic for a fixed seed', async () => {
    const { services } = createMockLanguage({
      tags: { pipeline: 'NN', reliable: 'JJ', deployments: 'NNS' },
      synonyms: { pipeline: ['workflow', 'grapevine'], reliable: ['dependable'], deployments: ['rollouts'] },
    });
    const paraphraser = new Paraphraser(services);
    const input = 'A reliable pipeline speeds deployments. Teams review the pipeline daily.';

    const first = await paraphraser.paraphrase(input, new SeededRandom(1234));
    const second = await paraphraser.paraphrase(input, new SeededRandom(1234));

    expect(first).toBe(second);
  });

  it('should not substitute at all with a zero substitution rate', async () => {
    const { services, lookup } = createMockLanguage({
      tags: { servers: 'NNS' },
      synonyms: { servers: ['hosts'] },
    });
    const paraphraser = new Paraphraser(services, { substitutionRate: 0, shuffleRate: 0 });

    expect(await paraphraser.paraphrase('The servers run. They idle.', createConstantRandom(0))).toBe(
      'The servers run . They idle .',
    );
    expect(lookup).not.toHaveBeenCalled();
  });
});
