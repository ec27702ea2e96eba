export {
  SeedCorpusBuilder,
  createSeedCorpusBuilder,
  type CorpusObserver,
  type SeedCorpusConfig,
} from './seed-corpus-builder.js';
export {
  SeedUrlStrategy,
  CuratedDefaultsStrategy,
  LocalFallbackStrategy,
  type CorpusStrategy,
  type CorpusContext,
  type StrategyResult,
} from './strategies.js';
export {
  UnitFetcher,
  DEFAULT_UNIT_FETCH_CONFIG,
  type UnitFetchConfig,
  type UnitFetchResult,
  type UnavailableSource,
  type UnavailableReason,
  type FetchOutcome,
} from './unit-fetcher.js';
export {
  CURATED_SOURCES,
  curatedUrlsFor,
  mergeCuratedSources,
  topicKey,
  type CuratedSourceMap,
} from './curated-sources.js';
