/**
 * Seed Corpus Builder
 */

import type { SeedCorpus, SourceFetcher } from '@quarry/types';

import { EmptyCorpusError } from '../errors.js';

import { CURATED_SOURCES, type CuratedSourceMap } from './curated-sources.js';
import {
  CuratedDefaultsStrategy,
  LocalFallbackStrategy,
  SeedUrlStrategy,
  type CorpusContext,
  type CorpusStrategy,
} from './strategies.js';
import { UnitFetcher, type UnavailableSource, type UnitFetchConfig } from './unit-fetcher.js';

/**
 * Receives fetch failures and the chosen tier, for logging
 */
export interface CorpusObserver {
  onUnavailable?(source: UnavailableSource): void;
  onStrategyComplete?(origin: SeedCorpus['origin'], unitCount: number): void;
}

/**
 * Builder configuration
 */
export interface SeedCorpusConfig extends Partial<UnitFetchConfig> {
  /** Characters kept per fetched page (default 2000) */
  maxChars?: number;
  /** Curated map used by the second tier */
  curatedSources?: CuratedSourceMap;
}

/**
 * Assembles the seed corpus for a request through an ordered list of strategies
 */
export class SeedCorpusBuilder {
  constructor(
    private readonly strategies: readonly CorpusStrategy[],
    private readonly observer: CorpusObserver = {},
  ) {}

  /**
   * Build a non-empty corpus. Fetch failures are reported to the observer and never thrown.
   */
  async build(topic: string, seedUrls: readonly string[], signal?: AbortSignal): Promise<SeedCorpus> {
    const cleaned = seedUrls.map((u) => u.trim()).filter((u) => u.length > 0);
    const context: CorpusContext = signal
      ? { topic, seedUrls: cleaned, signal }
      : { topic, seedUrls: cleaned };
    const unavailable: string[] = [];

    for (const strategy of this.strategies) {
      const result = await strategy.collect(context);
      for (const source of result.unavailable) {
        unavailable.push(source.url);
        this.observer.onUnavailable?.(source);
      }

      const units = result.units.filter((u) => u.text.trim().length > 0);
      if (units.length > 0) {
        this.observer.onStrategyComplete?.(strategy.origin, units.length);
        return { units, origin: strategy.origin, unavailable };
      }
    }

    throw new EmptyCorpusError(topic);
  }
}

/**
 * Builder with the standard three tiers: seed URLs, curated defaults, local fallback
 */
export function createSeedCorpusBuilder(
  fetcher: SourceFetcher,
  config: SeedCorpusConfig = {},
  observer: CorpusObserver = {},
): SeedCorpusBuilder {
  const { maxChars = 2000, curatedSources = CURATED_SOURCES, ...fetchConfig } = config;
  const unitFetcher = new UnitFetcher(fetcher, fetchConfig);
  return new SeedCorpusBuilder(
    [
      new SeedUrlStrategy(unitFetcher, maxChars),
      new CuratedDefaultsStrategy(unitFetcher, maxChars, curatedSources),
      new LocalFallbackStrategy(),
    ],
    observer,
  );
}
