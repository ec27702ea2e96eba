/**
 * @quarry/store - SQLite persistence for generated questions
 */

export { BaseDatabaseClient, IN_MEMORY, type DatabaseClientConfig } from './clients/base.js';
export {
  SqliteQuestionStore,
  DEFAULT_STORE_CONFIG,
  type QuestionStoreConfig,
  type StoredInterview,
} from './clients/sqlite-question-store.js';
export { StoreError, ConnectionError, QueryError, InterviewNotFoundError } from './errors.js';
