/**
 * @quarry/test-utils
 *
 * Shared in-process fakes for Quarry tests
 */

export {
  createMockLanguage,
  type MockLanguage,
  type MockLanguageConfig,
} from './mocks/mock-language.js';

export { SequenceRandom, createSequenceRandom, createConstantRandom } from './mocks/mock-random.js';

export { createMockFetcher, type MockFetcher, type MockFetcherConfig } from './mocks/mock-fetcher.js';

export {
  InMemoryQuestionStore,
  createMockStore,
  type MockStoreConfig,
} from './mocks/mock-store.js';

export {
  createMockServices,
  type MockServices,
  type MockServicesConfig,
} from './mocks/mock-services.js';
