/**
 * Output formatting utilities
 */

import chalk from 'chalk';
import { LOCAL_FALLBACK_SOURCE } from '@quarry/types';

import type { QuarryConfig } from '../config/schema.js';

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: QuarryConfig): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Configuration:'));
  lines.push('');

  lines.push(chalk.dim('Generation:'));
  lines.push(`  Default count: ${config.generation.defaultCount}`);
  lines.push(`  Batch size: ${config.generation.batchSize}`);
  lines.push(`  Paragraph window: ${config.generation.paragraphWindow}`);
  lines.push(`  Salient terms: ${config.generation.maxTerms} (min length ${config.generation.minTermLength})`);
  lines.push('');

  lines.push(chalk.dim('Paraphrase:'));
  lines.push(`  Substitution rate: ${config.paraphrase.substitutionRate}`);
  lines.push(`  Shuffle rate: ${config.paraphrase.shuffleRate}`);
  lines.push('');

  lines.push(chalk.dim('Fetch:'));
  lines.push(`  Timeout: ${formatDuration(config.fetch.timeoutMs)}`);
  lines.push(`  Max characters: ${config.fetch.maxChars}`);
  lines.push(`  Concurrency: ${config.fetch.concurrency}`);
  lines.push(`  User agent: ${config.fetch.userAgent}`);
  lines.push('');

  const curatedTopics = Object.keys(config.sources.curated);
  lines.push(chalk.dim('Sources:'));
  lines.push(`  Extra curated topics: ${curatedTopics.length > 0 ? curatedTopics.join(', ') : 'none'}`);
  lines.push('');

  lines.push(chalk.dim('Store:'));
  lines.push(`  Database: ${config.store.dbPath}`);
  lines.push('');

  lines.push(chalk.dim('Study:'));
  lines.push(`  Default pairs: ${config.study.defaultPairs}`);
  lines.push(`  Answer characters: ${config.study.answerChars}`);

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Spinner text for a running phase. Elapsed time shows once it reaches a second.
 */
export function formatPhaseProgress(
  phaseName: string,
  current: number,
  total: number,
  elapsedMs: number,
): string {
  const elapsed = elapsedMs >= 1000 ? ` (${formatDuration(elapsedMs)})` : '';
  return `${phaseName}... ${current}/${total}${elapsed}`;
}

/**
 * Format a stored question as `Q{n}. text`, with its source underneath
 * unless the question came from the local fallback
 */
export function formatQuestion(index: number, text: string, sourceIdentifier: string): string[] {
  const lines = [`Q${index + 1}. ${text}`];
  if (sourceIdentifier !== LOCAL_FALLBACK_SOURCE) {
    lines.push(`    ${sourceIdentifier}`);
  }
  return lines;
}
