/**
 * Error handling utilities
 */

import chalk from 'chalk';
import {
  GenerationCancelledError,
  InvalidRequestError,
  NoSourcesError,
  PersistenceError,
} from '@quarry/core';
import { LanguageResourceError } from '@quarry/language';
import { ConnectionError, InterviewNotFoundError, QueryError } from '@quarry/store';

import { ConfigValidationError } from '../config/validation.js';

import { CliError, InputError, RunFailedError, ServiceError } from './cli-errors.js';

/** Exit code for a run stopped by SIGINT */
export const EXIT_CANCELLED = 130;

/**
 * Map library errors to CLI errors with suggestions.
 * Errors without a CLI counterpart are returned unchanged.
 */
export function toCliError(error: unknown): unknown {
  if (error instanceof PersistenceError) {
    return new RunFailedError(
      error.message,
      error.persistedCount,
      'Questions already stored are kept; rerun with --interview to append the rest',
    );
  }

  if (error instanceof GenerationCancelledError) {
    return new RunFailedError(error.message, error.persistedCount, undefined, EXIT_CANCELLED);
  }

  if (error instanceof InvalidRequestError) {
    return new InputError(error.message, 'Run with --help to see accepted values');
  }

  if (error instanceof NoSourcesError) {
    return new InputError(error.message, 'Pass a reachable page with --url');
  }

  if (error instanceof InterviewNotFoundError) {
    return new InputError(error.message, 'Use the interview id printed after `quarry generate`');
  }

  if (error instanceof ConnectionError) {
    return new ServiceError('Question store', error.message, 'Check the --db path and its permissions');
  }

  if (error instanceof QueryError) {
    return new ServiceError('Question store', error.message, 'Run with --verbose and check the --db file');
  }

  if (error instanceof LanguageResourceError) {
    return new ServiceError(
      'Language resources',
      error.message,
      'Reinstall dependencies so the natural package ships its lexicon and WordNet data',
    );
  }

  return error;
}

/**
 * Format and display an error for CLI output
 */
export function formatError(error: unknown): string {
  const mapped = toCliError(error);

  if (mapped instanceof ConfigValidationError) {
    return chalk.red(mapped.format());
  }

  if (mapped instanceof CliError) {
    return chalk.red(mapped.format());
  }

  if (mapped instanceof Error) {
    return chalk.red(`Error: ${mapped.message}`);
  }

  return chalk.red(`Error: ${String(mapped)}`);
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));

  const mapped = toCliError(error);
  let exitCode = 1;
  if (mapped instanceof CliError) {
    exitCode = mapped.exitCode;
  }

  process.exit(exitCode);
}
