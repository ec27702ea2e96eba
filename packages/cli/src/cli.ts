/**
 * CLI definition using Commander.js
 */

import { Command, InvalidArgumentError } from 'commander';

import type { CliOptions } from './config/schema.js';

export const VERSION = '0.1.0';

const GENERATE_HELP = `Generate interview questions for a topic and store them.

Sources are tried in order: the URLs you pass, the curated pages for the
topic, and finally a built-in paragraph. Questions are written in batches,
so an interrupted run keeps every batch already stored.`;

const STUDY_HELP = `Prepare question and answer pairs for reading practice.

Answers paraphrase the opening of the page each question was drawn from.`;

/**
 * Parse a whole-number option value
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not a whole number.');
  }
  return parsed;
}

/**
 * Options every command accepts
 */
function addCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Path to config file')
    .option('--db <path>', 'Question store path (default: quarry.db)')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .option('--verbose', 'Print skipped sources and stored batches');
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('quarry')
    .description('Generate scenario-based interview questions from web sources')
    .version(VERSION);

  addCommonOptions(
    program
      .command('generate')
      .argument('<topic>', 'Topic to generate questions for')
      .description(GENERATE_HELP)
      .option('-n, --count <n>', 'Questions to generate (30-75)', parseInteger)
      .option('-u, --url <url...>', 'Seed URLs to draw questions from')
      .option('--urls-file <file>', 'File with one seed URL per line')
      .option('--interview <id>', 'Append to an existing interview')
      .option('--user <id>', 'Owner of the new interview (default: a guest id)')
      .option('--seed <n>', 'Seed for reproducible output', parseInteger)
      .option('--batch-size <n>', 'Questions per store write', parseInteger)
      .option('--concurrency <n>', 'Pages fetched in parallel', parseInteger)
      .option('--fetch-timeout <ms>', 'Time bound per page fetch', parseInteger)
      .option('--dry-run', 'Validate setup and configuration without generating'),
  ).action(async (topic: string, options: Record<string, unknown>) => {
    const { generateCommand } = await import('./commands/generate.js');
    await generateCommand(topic, options);
  });

  addCommonOptions(
    program
      .command('study')
      .argument('<topic>', 'Topic to study')
      .description(STUDY_HELP)
      .option('-u, --url <url>', 'Page to study (default: curated pages for the topic)')
      .option('--pairs <n>', 'Pairs to prepare (3-20)', parseInteger)
      .option('--interview <id>', 'Also store the questions under this interview')
      .option('--seed <n>', 'Seed for reproducible output', parseInteger)
      .option('--concurrency <n>', 'Pages fetched in parallel', parseInteger)
      .option('--fetch-timeout <ms>', 'Time bound per page fetch', parseInteger),
  ).action(async (topic: string, options: Record<string, unknown>) => {
    const { studyCommand } = await import('./commands/study.js');
    await studyCommand(topic, options);
  });

  addCommonOptions(
    program
      .command('list')
      .argument('<interviewId>', 'Interview to show')
      .description('Print the stored questions of an interview')
      .option('--limit <n>', 'Questions to print', parseInteger, 10),
  ).action(async (interviewId: string, options: Record<string, unknown>) => {
    const { listCommand } = await import('./commands/list.js');
    await listCommand(interviewId, options);
  });

  return program;
}

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

function numberOption(options: Record<string, unknown>, key: string): number | undefined {
  const value = options[key];
  return typeof value === 'number' ? value : undefined;
}

function booleanOption(options: Record<string, unknown>, key: string): boolean | undefined {
  const value = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * `--url` is variadic on generate and single on study
 */
function urlListOption(options: Record<string, unknown>): string[] | undefined {
  const value = options['url'];
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return undefined;
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const config = stringOption(options, 'config');
  if (config !== undefined) result.config = config;
  const db = stringOption(options, 'db');
  if (db !== undefined) result.db = db;
  const showConfig = booleanOption(options, 'showConfig');
  if (showConfig !== undefined) result.showConfig = showConfig;
  // Commander.js stores --no-color as color: false
  if (options['color'] === false) result.noColor = true;
  const dryRun = booleanOption(options, 'dryRun');
  if (dryRun !== undefined) result.dryRun = dryRun;
  const verbose = booleanOption(options, 'verbose');
  if (verbose !== undefined) result.verbose = verbose;

  const seed = numberOption(options, 'seed');
  if (seed !== undefined) result.seed = seed;
  const count = numberOption(options, 'count');
  if (count !== undefined) result.count = count;
  const urls = urlListOption(options);
  if (urls !== undefined) result.urls = urls;
  const urlsFile = stringOption(options, 'urlsFile');
  if (urlsFile !== undefined) result.urlsFile = urlsFile;
  const interview = stringOption(options, 'interview');
  if (interview !== undefined) result.interview = interview;
  const user = stringOption(options, 'user');
  if (user !== undefined) result.user = user;

  const batchSize = numberOption(options, 'batchSize');
  if (batchSize !== undefined) result.batchSize = batchSize;
  const concurrency = numberOption(options, 'concurrency');
  if (concurrency !== undefined) result.concurrency = concurrency;
  const fetchTimeout = numberOption(options, 'fetchTimeout');
  if (fetchTimeout !== undefined) result.fetchTimeout = fetchTimeout;
  const pairs = numberOption(options, 'pairs');
  if (pairs !== undefined) result.pairs = pairs;
  const limit = numberOption(options, 'limit');
  if (limit !== undefined) result.limit = limit;

  return result;
}
