/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig } from 'cosmiconfig';

import { ConfigError } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { CliOptions, QuarryConfig } from './schema.js';
import { ConfigValidationError, validateConfig, validatePartialConfig } from './validation.js';

type ConfigTree = Record<string, unknown>;

/**
 * Environment variable mapping
 * Maps env var names to config paths
 */
const ENV_VAR_MAP: Record<string, string> = {
  // Generation
  QUARRY_BATCH_SIZE: 'generation.batchSize',
  QUARRY_DEFAULT_COUNT: 'generation.defaultCount',

  // Paraphrase
  QUARRY_SUBSTITUTION_RATE: 'paraphrase.substitutionRate',
  QUARRY_SHUFFLE_RATE: 'paraphrase.shuffleRate',

  // Fetch
  QUARRY_FETCH_TIMEOUT: 'fetch.timeoutMs',
  QUARRY_FETCH_MAX_CHARS: 'fetch.maxChars',
  QUARRY_FETCH_CONCURRENCY: 'fetch.concurrency',
  QUARRY_USER_AGENT: 'fetch.userAgent',

  // Store
  QUARRY_DB: 'store.dbPath',

  // Study
  QUARRY_STUDY_PAIRS: 'study.defaultPairs',
};

/**
 * Config paths whose environment values are parsed as numbers
 */
const NUMERIC_PATHS = new Set([
  'generation.batchSize',
  'generation.defaultCount',
  'paraphrase.substitutionRate',
  'paraphrase.shuffleRate',
  'fetch.timeoutMs',
  'fetch.maxChars',
  'fetch.concurrency',
  'study.defaultPairs',
]);

function isPlainObject(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two config trees.
 * Source values override target values; arrays are replaced, not merged.
 */
function deepMerge(target: ConfigTree, source: ConfigTree): ConfigTree {
  const result: ConfigTree = {};

  for (const [key, value] of Object.entries(target)) {
    result[key] = isPlainObject(value) ? deepMerge({}, value) : value;
  }

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const existing = result[key];
    if (isPlainObject(value)) {
      result[key] = deepMerge(isPlainObject(existing) ? existing : {}, value);
    } else if (Array.isArray(value)) {
      result[key] = [...value];
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Set a nested property on an object using dot notation path
 */
function setNestedProperty(obj: ConfigTree, path: string, value: unknown): void {
  const parts = path.split('.');
  const lastPart = parts.pop();
  if (lastPart === undefined) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: ConfigTree = {};
      current[part] = created;
      current = created;
    }
  }

  current[lastPart] = value;
}

/**
 * Parse environment variable value based on expected type
 */
function parseEnvValue(value: string, path: string): unknown {
  if (NUMERIC_PATHS.has(path)) {
    const num = parseFloat(value);
    return isNaN(num) ? value : num;
  }
  return value;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigTree {
  const config: ConfigTree = {};

  for (const [envVar, configPath] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedProperty(config, configPath, parseEnvValue(value, configPath));
    }
  }

  return config;
}

/**
 * Load configuration from config file using cosmiconfig
 */
async function loadConfigFile(configPath?: string): Promise<ConfigTree | null> {
  const explorer = cosmiconfig('quarry', {
    searchPlaces: [
      'package.json',
      '.quarryrc',
      '.quarryrc.json',
      '.quarryrc.yaml',
      '.quarryrc.yml',
      '.quarryrc.js',
      '.quarryrc.cjs',
      'quarry.config.js',
      'quarry.config.cjs',
    ],
  });

  let loaded: unknown;
  try {
    const result = configPath ? await explorer.load(configPath) : await explorer.search();
    loaded = result?.config;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Failed to read config file${configPath ? ` ${configPath}` : ''}: ${reason}`,
      'Check that the file exists and is valid JSON, YAML or JavaScript',
    );
  }

  if (loaded === undefined || loaded === null) {
    return null;
  }
  if (!isPlainObject(loaded)) {
    throw new ConfigValidationError([{ path: '(root)', message: 'Expected an object' }]);
  }

  validatePartialConfig(loaded);
  return loaded;
}

/**
 * Map CLI options to config object
 */
function mapCliToConfig(options: CliOptions): ConfigTree {
  const config: ConfigTree = {};

  if (options.db !== undefined) {
    setNestedProperty(config, 'store.dbPath', options.db);
  }
  if (options.batchSize !== undefined) {
    setNestedProperty(config, 'generation.batchSize', options.batchSize);
  }
  if (options.concurrency !== undefined) {
    setNestedProperty(config, 'fetch.concurrency', options.concurrency);
  }
  if (options.fetchTimeout !== undefined) {
    setNestedProperty(config, 'fetch.timeoutMs', options.fetchTimeout);
  }

  return config;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<QuarryConfig> {
  let config = deepMerge({}, { ...DEFAULT_CONFIG });

  const fileConfig = await loadConfigFile(cliOptions.config);
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }

  config = deepMerge(config, loadEnvConfig(env));
  config = deepMerge(config, mapCliToConfig(cliOptions));

  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: QuarryConfig): string {
  return JSON.stringify(config, null, 2);
}
