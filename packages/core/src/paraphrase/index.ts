export { Paraphraser, DEFAULT_PARAPHRASE_CONFIG, type ParaphraseConfig } from './paraphraser.js';
