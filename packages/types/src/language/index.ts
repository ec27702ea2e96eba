/**
 * Language service contracts
 *
 * Implemented by @quarry/language on top of natural, and by fixed
 * fakes in @quarry/test-utils.
 */

/**
 * A token with its Penn Treebank part-of-speech tag
 */
export interface TaggedToken {
  token: string;
  tag: string;
}

/**
 * Splits text into sentences and words
 */
export interface TextTokenizer {
  sentences(text: string): string[];
  words(text: string): string[];
}

/**
 * Assigns a part-of-speech tag to each token
 */
export interface WordTagger {
  tag(tokens: string[]): TaggedToken[];
}

/**
 * Looks up synonym candidates for a word
 */
export interface SynonymLexicon {
  /** All candidate surfaces, possibly including the word itself */
  synonyms(word: string): Promise<string[]>;
}

/**
 * Read-only language services shared by the extractor and paraphraser
 */
export interface LanguageServices {
  tokenizer: TextTokenizer;
  tagger: WordTagger;
  lexicon: SynonymLexicon;
}

/**
 * Uniform random draws in [0, 1)
 */
export interface RandomSource {
  next(): number;
}
