/**
 * Combined mock services factory for integration testing
 */

import type { LanguageServices } from '@quarry/types';

import { createMockFetcher, type MockFetcher, type MockFetcherConfig } from './mock-fetcher.js';
import { createMockLanguage, type MockLanguageConfig } from './mock-language.js';
import { createMockStore, type InMemoryQuestionStore, type MockStoreConfig } from './mock-store.js';

/**
 * Configuration for all mock services
 */
export interface MockServicesConfig {
  fetcher?: MockFetcherConfig;
  language?: MockLanguageConfig;
  store?: MockStoreConfig;
}

/**
 * Container for all mock services, shaped like the CLI's Services
 */
export interface MockServices {
  fetcher: MockFetcher;
  language: LanguageServices;
  store: InMemoryQuestionStore;
  close: () => void;
}

/**
 * Create all mock services for integration testing
 */
export function createMockServices(config: MockServicesConfig = {}): MockServices {
  return {
    fetcher: createMockFetcher(config.fetcher),
    language: createMockLanguage(config.language).services,
    store: createMockStore(config.store),
    close: () => undefined,
  };
}
