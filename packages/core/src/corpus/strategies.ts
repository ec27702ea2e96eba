/**
 * Corpus strategies
 *
 * Each tier of the seed corpus fallback chain. The builder runs them in
 * order and stops at the first one yielding a usable unit.
 */

import { LOCAL_FALLBACK_SOURCE } from '@quarry/types';
import type { CorpusOrigin, SourceUnit } from '@quarry/types';

import { fallbackParagraph } from '../composer/index.js';

import { curatedUrlsFor, type CuratedSourceMap, CURATED_SOURCES } from './curated-sources.js';
import type { UnavailableSource, UnitFetcher } from './unit-fetcher.js';

/**
 * Inputs shared by all strategies of one build
 */
export interface CorpusContext {
  topic: string;
  /** Trimmed, non-blank seed URLs */
  seedUrls: readonly string[];
  signal?: AbortSignal;
}

/**
 * What a strategy produced
 */
export interface StrategyResult {
  units: SourceUnit[];
  unavailable: UnavailableSource[];
}

/**
 * One tier of the fallback chain
 */
export interface CorpusStrategy {
  readonly origin: CorpusOrigin;
  collect(context: CorpusContext): Promise<StrategyResult>;
}

/**
 * Tier 1: the caller's seed URLs
 */
export class SeedUrlStrategy implements CorpusStrategy {
  readonly origin = 'seed-urls' as const;

  constructor(
    private readonly unitFetcher: UnitFetcher,
    private readonly maxChars: number,
  ) {}

  collect(context: CorpusContext): Promise<StrategyResult> {
    return this.unitFetcher.fetchAll(context.seedUrls, this.maxChars, context.signal);
  }
}

/**
 * Tier 2: curated overview pages for the topic keyword
 */
export class CuratedDefaultsStrategy implements CorpusStrategy {
  readonly origin = 'curated-defaults' as const;

  constructor(
    private readonly unitFetcher: UnitFetcher,
    private readonly maxChars: number,
    private readonly sources: CuratedSourceMap = CURATED_SOURCES,
  ) {}

  collect(context: CorpusContext): Promise<StrategyResult> {
    return this.unitFetcher.fetchAll(
      curatedUrlsFor(context.topic, this.sources),
      this.maxChars,
      context.signal,
    );
  }
}

/**
 * Tier 3: one synthetic paragraph about the topic. Never fails.
 */
export class LocalFallbackStrategy implements CorpusStrategy {
  readonly origin = 'local-fallback' as const;

  collect(context: CorpusContext): Promise<StrategyResult> {
    return Promise.resolve({
      units: [{ identifier: LOCAL_FALLBACK_SOURCE, text: fallbackParagraph(context.topic) }],
      unavailable: [],
    });
  }
}
