/**
 * @quarry/core - Question synthesis for Quarry
 *
 * This package contains the generation pipeline including:
 * - Seed corpus assembly with a fallback chain
 * - Salient term extraction
 * - Question composition and paraphrasing
 * - Batched persistence through a question store
 */

export const VERSION = '0.1.0';

// Re-export errors
export * from './errors.js';

// Re-export randomness
export * from './random/index.js';

// Re-export text stages
export * from './salience/index.js';
export * from './composer/index.js';
export * from './paraphrase/index.js';

// Re-export corpus assembly
export * from './corpus/index.js';

// Re-export request validation
export * from './validation/index.js';

// Re-export pipelines
export * from './pipeline/index.js';
