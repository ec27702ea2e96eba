/**
 * Configuration schema types for the Quarry CLI
 */

/**
 * Question generation settings
 */
export interface GenerationConfigSchema {
  /** Questions per store write */
  batchSize: number;
  /** Leading paragraphs of a source a question may be drawn from */
  paragraphWindow: number;
  /** Salient terms kept per paragraph */
  maxTerms: number;
  /** Shortest surface form counted as salient */
  minTermLength: number;
  /** Question count used when --count is absent */
  defaultCount: number;
}

/**
 * Paraphrase settings
 */
export interface ParaphraseConfigSchema {
  /** Chance that a noun or adjective is swapped for a synonym (0.0-1.0) */
  substitutionRate: number;
  /** Chance that sentence order is shuffled (0.0-1.0) */
  shuffleRate: number;
}

/**
 * Source fetching settings
 */
export interface FetchConfigSchema {
  /** Per-page time bound (ms) */
  timeoutMs: number;
  /** Characters kept per page */
  maxChars: number;
  /** Pages fetched in parallel */
  concurrency: number;
  userAgent: string;
}

/**
 * Extra curated sources, keyed by lower-cased topic
 */
export interface SourcesConfigSchema {
  curated: Record<string, string[]>;
}

/**
 * Question store settings
 */
export interface StoreConfigSchema {
  /** SQLite file path (":memory:" for a throwaway store) */
  dbPath: string;
}

/**
 * Study pair settings
 */
export interface StudyConfigSchema {
  defaultPairs: number;
  /** Characters kept from a page given with --url */
  sourceMaxChars: number;
  /** Characters kept from each curated page */
  defaultSourceMaxChars: number;
  /** Leading characters paraphrased into each answer */
  answerChars: number;
}

/**
 * Complete Quarry configuration
 */
export interface QuarryConfig {
  generation: GenerationConfigSchema;
  paraphrase: ParaphraseConfigSchema;
  fetch: FetchConfigSchema;
  sources: SourcesConfigSchema;
  store: StoreConfigSchema;
  study: StudyConfigSchema;
}

/**
 * Options shared by every command
 */
export interface CliOptions {
  /** Path to config file */
  config?: string;
  /** Question store path */
  db?: string;
  /** Print resolved config and exit */
  showConfig?: boolean;
  /** Disable colored output */
  noColor?: boolean;
  /** Validate setup without generating anything */
  dryRun?: boolean;
  /** Print per-URL failures and flush events */
  verbose?: boolean;
  /** Seed for reproducible runs */
  seed?: number;
  /** Questions to generate */
  count?: number;
  /** Seed URLs */
  urls?: string[];
  /** File with one seed URL per line */
  urlsFile?: string;
  /** Existing interview to append to */
  interview?: string;
  /** User a new interview is created for */
  user?: string;
  batchSize?: number;
  concurrency?: number;
  fetchTimeout?: number;
  /** Study pairs to prepare */
  pairs?: number;
  /** Rows printed by `list` */
  limit?: number;
}
