/**
 * Helpers shared by the command handlers
 */

import * as fs from 'node:fs';

import { formatConfig } from '../config/loader.js';
import type { QuarryConfig } from '../config/schema.js';
import { InputError, resolveAbsolutePath } from '../errors/index.js';
import { formatConfigDisplay } from '../progress/formatters.js';

/**
 * Read seed URLs from a file, one per line.
 * Blank lines and lines starting with '#' are skipped.
 */
export function readUrlsFile(filePath: string): string[] {
  const absolutePath = resolveAbsolutePath(filePath);
  if (!fs.existsSync(absolutePath)) {
    throw new InputError(`URL file not found: ${absolutePath}`, 'Check the --urls-file path');
  }

  return fs
    .readFileSync(absolutePath, 'utf-8')
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Print the resolved configuration for --show-config
 */
export function printConfig(config: QuarryConfig): void {
  console.log(formatConfigDisplay(config));
  console.log('');
  console.log('Raw configuration:');
  console.log(formatConfig(config));
}

/**
 * Abort controller tied to Ctrl-C for the lifetime of a run
 */
export function createInterruptController(onInterrupt: () => void): {
  signal: AbortSignal;
  dispose: () => void;
} {
  const controller = new AbortController();
  const handler = (): void => {
    onInterrupt();
    controller.abort();
  };
  process.once('SIGINT', handler);

  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', handler);
    },
  };
}
