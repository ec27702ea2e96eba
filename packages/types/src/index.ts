/**
 * @quarry/types - Shared type definitions for Quarry
 *
 * Usage:
 *   import type { SourceUnit, GeneratedQuestion } from '@quarry/types';
 *   import type { SourceFetcher, QuestionStore } from '@quarry/types';
 */

export * from './source/index.js';
export * from './question/index.js';
export type * from './language/index.js';
export type * from './services/index.js';
