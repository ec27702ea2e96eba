/**
 * Configuration module exports
 */

// Schema types
export type {
  GenerationConfigSchema,
  ParaphraseConfigSchema,
  FetchConfigSchema,
  SourcesConfigSchema,
  StoreConfigSchema,
  StudyConfigSchema,
  QuarryConfig,
  CliOptions,
} from './schema.js';

export { DEFAULT_CONFIG } from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
} from './validation.js';

// Loader
export { loadConfig, loadEnvConfig, formatConfig } from './loader.js';
