/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { QuarryConfig } from './schema.js';

/**
 * Ratio schema (0.0-1.0)
 */
const ratioSchema = z.number().min(0).max(1);

export const generationConfigSchema = z.object({
  batchSize: z.number().int().min(1).max(75),
  paragraphWindow: z.number().int().min(1).max(20),
  maxTerms: z.number().int().min(1).max(10),
  minTermLength: z.number().int().min(1).max(20),
  defaultCount: z.number().int().min(30).max(75),
});

export const paraphraseConfigSchema = z.object({
  substitutionRate: ratioSchema,
  shuffleRate: ratioSchema,
});

export const fetchConfigSchema = z.object({
  timeoutMs: z.number().int().min(100).max(120000),
  maxChars: z.number().int().min(100).max(100000),
  concurrency: z.number().int().min(1).max(32),
  userAgent: z.string().min(1),
});

export const sourcesConfigSchema = z.object({
  curated: z.record(z.string(), z.array(z.string().url())),
});

export const storeConfigSchema = z.object({
  dbPath: z.string().min(1),
});

export const studyConfigSchema = z.object({
  defaultPairs: z.number().int().min(3).max(20),
  sourceMaxChars: z.number().int().min(100).max(100000),
  defaultSourceMaxChars: z.number().int().min(100).max(100000),
  answerChars: z.number().int().min(50).max(4000),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  generation: generationConfigSchema,
  paraphrase: paraphraseConfigSchema,
  fetch: fetchConfigSchema,
  sources: sourcesConfigSchema,
  store: storeConfigSchema,
  study: studyConfigSchema,
});

/**
 * Partial configuration schema (for config files)
 */
export const partialConfigSchema = z.object({
  generation: generationConfigSchema.partial().optional(),
  paraphrase: paraphraseConfigSchema.partial().optional(),
  fetch: fetchConfigSchema.partial().optional(),
  sources: sourcesConfigSchema.partial().optional(),
  store: storeConfigSchema.partial().optional(),
  study: studyConfigSchema.partial().optional(),
});

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): QuarryConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from config file)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): void {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
}
