/**
 * Process-wide language services
 */

import type { LanguageServices } from '@quarry/types';

import { PennTagger } from './tagger.js';
import { TreebankTokenizer } from './tokenizer.js';
import { WordNetLexicon } from './wordnet-lexicon.js';

let shared: LanguageServices | null = null;

/**
 * Create fresh language services, loading every model eagerly.
 *
 * @throws LanguageResourceError when a model cannot be loaded
 */
export function createLanguageServices(): LanguageServices {
  return {
    tokenizer: new TreebankTokenizer(),
    tagger: new PennTagger(),
    lexicon: new WordNetLexicon(),
  };
}

/**
 * Shared read-only services, created on first use
 */
export function getLanguageServices(): LanguageServices {
  shared ??= createLanguageServices();
  return shared;
}

/**
 * Drop the shared instance (tests only)
 */
export function resetLanguageServices(): void {
  shared = null;
}
