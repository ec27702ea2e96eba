import { describe, it, expect, vi } from 'vitest';

import { LanguageResourceError, loadResource } from '../errors.js';
import { getLanguageServices, resetLanguageServices } from '../services.js';
import { PennTagger } from '../tagger.js';
import { TreebankTokenizer, splitFinalPeriod } from '../tokenizer.js';
import { WordNetLexicon, type WordNetLike } from '../wordnet-lexicon.js';

describe('TreebankTokenizer', () => {
  const splitOnPeriods = { tokenize: (text: string) => text.split(/(?<=\.)/) };
  const splitOnSpaces = { tokenize: (text: string) => text.split(/\s+/) };

  it('should trim sentences and drop empty ones', () => {
    const tokenizer = new TreebankTokenizer(splitOnPeriods, splitOnSpaces);
    expect(tokenizer.sentences('  One.   Two. ')).toEqual(['One.', 'Two.']);
  });

  it('should treat text without a boundary as one sentence', () => {
    const tokenizer = new TreebankTokenizer({ tokenize: () => [] }, splitOnSpaces);
    expect(tokenizer.sentences(' no boundary here ')).toEqual(['no boundary here']);
  });

  it('should return nothing for blank text', () => {
    const sentences = { tokenize: vi.fn((_text: string) => ['x']) };
    const tokenizer = new TreebankTokenizer(sentences, splitOnSpaces);

    expect(tokenizer.sentences('   ')).toEqual([]);
    expect(tokenizer.words('')).toEqual([]);
    expect(sentences.tokenize).not.toHaveBeenCalled();
  });

  it('should split punctuation with the treebank tokenizer', () => {
    const tokenizer = new TreebankTokenizer();
    expect(tokenizer.words('Pods scale, fast.')).toEqual(['Pods', 'scale', ',', 'fast', '.']);
  });

  it('should detach a final period inside closing brackets', () => {
    const tokenizer = new TreebankTokenizer();
    expect(tokenizer.words('(Tie it into DevOps context.)')).toEqual([
      '(',
      'Tie',
      'it',
      'into',
      'DevOps',
      'context',
      '.',
      ')',
    ]);
  });

  it('should fold a stray closing bracket into the previous sentence', () => {
    const fragments = { tokenize: () => ['Why ?', '( Tie it in .', ')'] };
    const tokenizer = new TreebankTokenizer(fragments, splitOnSpaces);
    expect(tokenizer.sentences('ignored')).toEqual(['Why ?', '( Tie it in . )']);
  });
});

describe('splitFinalPeriod', () => {
  it('should split the period and each closer off the last word', () => {
    expect(splitFinalPeriod(['(', 'Tie', 'context.)'])).toEqual(['(', 'Tie', 'context', '.', ')']);
    expect(splitFinalPeriod(['say', 'it.', '"'])).toEqual(['say', 'it', '.', '"']);
  });

  it('should leave detached periods and ellipses alone', () => {
    expect(splitFinalPeriod(['fast', '.'])).toEqual(['fast', '.']);
    expect(splitFinalPeriod(['wait', '...', ')'])).toEqual(['wait', '...', ')']);
    expect(splitFinalPeriod([])).toEqual([]);
  });
});

describe('PennTagger', () => {
  it('should return the tagged words of the wrapped tagger', () => {
    const inner = {
      tag: vi.fn((tokens: string[]) => ({
        taggedWords: tokens.map((token) => ({ token, tag: token === 'cache' ? 'NN' : 'DT' })),
      })),
    };
    const tagger = new PennTagger(inner);

    expect(tagger.tag(['the', 'cache'])).toEqual([
      { token: 'the', tag: 'DT' },
      { token: 'cache', tag: 'NN' },
    ]);
  });

  it('should not call the wrapped tagger for no tokens', () => {
    const inner = { tag: vi.fn(() => ({ taggedWords: [] })) };
    expect(new PennTagger(inner).tag([])).toEqual([]);
    expect(inner.tag).not.toHaveBeenCalled();
  });

  it('should tag determiners with the English Brill model', () => {
    const [first] = new PennTagger().tag(['the', 'server']);
    expect(first).toEqual({ token: 'the', tag: 'DT' });
  });
});

describe('WordNetLexicon', () => {
  function createWordNet(entries: Record<string, string[][]>) {
    const wordnet = {
      lookup: vi.fn((word: string, callback: (results: Array<{ synonyms: string[] }>) => void) => {
        callback((entries[word] ?? []).map((synonyms) => ({ synonyms })));
      }),
    };
    return wordnet satisfies WordNetLike;
  }

  it('should flatten synsets and replace underscores', async () => {
    const lexicon = new WordNetLexicon(
      createWordNet({ server: [['server', 'host'], ['waiter', 'server', 'service_provider']] }),
    );

    expect(await lexicon.synonyms('server')).toEqual([
      'server',
      'host',
      'waiter',
      'server',
      'service provider',
    ]);
  });

  it('should memoize lookups case-insensitively', async () => {
    const wordnet = createWordNet({ cache: [['cache', 'hoard']] });
    const lexicon = new WordNetLexicon(wordnet);

    await lexicon.synonyms('Cache');
    await lexicon.synonyms('cache');

    expect(wordnet.lookup).toHaveBeenCalledTimes(1);
    expect(wordnet.lookup).toHaveBeenCalledWith('cache', expect.any(Function));
    expect(lexicon.size).toBe(1);
  });

  it('should return an empty list for unknown words', async () => {
    const lexicon = new WordNetLexicon(createWordNet({}));
    expect(await lexicon.synonyms('kubectl')).toEqual([]);
  });
});

describe('language resources', () => {
  it('should wrap loader failures', () => {
    expect(() =>
      loadResource('wordnet', () => {
        throw new Error('missing dictionary');
      }),
    ).toThrow(LanguageResourceError);

    try {
      loadResource('wordnet', () => {
        throw new Error('missing dictionary');
      });
    } catch (error) {
      expect(error).toBeInstanceOf(LanguageResourceError);
      if (error instanceof LanguageResourceError) {
        expect(error.resource).toBe('wordnet');
        expect(error.cause?.message).toBe('missing dictionary');
        expect(error.message).toBe('Failed to load language resource "wordnet": missing dictionary');
      }
    }
  });

  it('should share one instance per process', () => {
    resetLanguageServices();
    const first = getLanguageServices();
    expect(getLanguageServices()).toBe(first);
    resetLanguageServices();
    expect(getLanguageServices()).not.toBe(first);
  });
});
