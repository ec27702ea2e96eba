export { SalienceExtractor, type SalienceConfig } from './salience-extractor.js';
export { categorizeTag, isContentTag } from './tag-categories.js';
