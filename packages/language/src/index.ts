/**
 * @quarry/language - Language services backed by natural
 */

export { TreebankTokenizer, splitFinalPeriod, type Tokenize } from './tokenizer.js';
export { PennTagger, type BrillTaggerLike } from './tagger.js';
export { WordNetLexicon, type WordNetLike } from './wordnet-lexicon.js';
export { createLanguageServices, getLanguageServices, resetLanguageServices } from './services.js';
export { LanguageResourceError, loadResource } from './errors.js';
