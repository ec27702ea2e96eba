/**
 * Fixed language services for testing
 *
 * A regex tokenizer, a dictionary tagger and a dictionary lexicon, so tests
 * control every tag and synonym without loading natural's models.
 */

import { vi } from 'vitest';
import type { LanguageServices, TaggedToken } from '@quarry/types';

export interface MockLanguageConfig {
  /** Tag per token (exact surface) */
  tags?: Record<string, string>;
  /** Tag for tokens missing from `tags` (default 'DT') */
  defaultTag?: string;
  /** Synonyms per lower-cased word */
  synonyms?: Record<string, string[]>;
}

const SENTENCE_BREAK = /(?<=[.!?])\s+/;
const WORD = /[A-Za-z0-9][A-Za-z0-9'-]*|[^\sA-Za-z0-9]/g;

/**
 * Create language services backed by plain dictionaries
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createMockLanguage(config: MockLanguageConfig = {}) {
  const { tags = {}, defaultTag = 'DT', synonyms = {} } = config;

  const sentences = vi.fn((text: string): string[] =>
    text
      .trim()
      .split(SENTENCE_BREAK)
      .filter((s) => s.length > 0),
  );
  const words = vi.fn((text: string): string[] => text.match(WORD) ?? []);
  const tag = vi.fn((tokens: string[]): TaggedToken[] =>
    tokens.map((token) => ({ token, tag: tags[token] ?? defaultTag })),
  );
  const lookup = vi.fn(async (word: string): Promise<string[]> => synonyms[word.toLowerCase()] ?? []);

  const services: LanguageServices = {
    tokenizer: { sentences, words },
    tagger: { tag },
    lexicon: { synonyms: lookup },
  };

  return { services, sentences, words, tag, lookup };
}

export type MockLanguage = ReturnType<typeof createMockLanguage>;
