/**
 * CLI options parsing tests
 */

import { InvalidArgumentError } from 'commander';
import { describe, it, expect } from 'vitest';

import { createProgram, parseCliOptions, parseInteger } from '../cli.js';

describe('parseCliOptions', () => {
  it('should parse string options', () => {
    const result = parseCliOptions({
      config: './quarry.json',
      db: 'questions.db',
      urlsFile: 'urls.txt',
      interview: 'abc',
      user: 'guest_1234',
    });

    expect(result).toEqual({
      config: './quarry.json',
      db: 'questions.db',
      urlsFile: 'urls.txt',
      interview: 'abc',
      user: 'guest_1234',
    });
  });

  it('should parse numeric options', () => {
    const result = parseCliOptions({
      count: 50,
      seed: 7,
      batchSize: 10,
      concurrency: 2,
      fetchTimeout: 3000,
      pairs: 4,
      limit: 20,
    });

    expect(result).toEqual({
      count: 50,
      seed: 7,
      batchSize: 10,
      concurrency: 2,
      fetchTimeout: 3000,
      pairs: 4,
      limit: 20,
    });
  });

  it('should accept a variadic or single --url', () => {
    expect(parseCliOptions({ url: ['https://a.example', 'https://b.example'] }).urls).toEqual([
      'https://a.example',
      'https://b.example',
    ]);
    expect(parseCliOptions({ url: 'https://a.example' }).urls).toEqual(['https://a.example']);
  });

  it('should parse noColor when color is false (Commander.js negated flag)', () => {
    expect(parseCliOptions({ color: false }).noColor).toBe(true);
    expect(parseCliOptions({ color: true }).noColor).toBeUndefined();
  });

  it('should parse boolean flags', () => {
    const result = parseCliOptions({ showConfig: true, dryRun: true, verbose: true });
    expect(result).toEqual({ showConfig: true, dryRun: true, verbose: true });
  });

  it('should drop values of the wrong type', () => {
    expect(parseCliOptions({ count: '40', db: 3, verbose: 'yes' })).toEqual({});
  });

  it('should return empty object for empty options', () => {
    expect(parseCliOptions({})).toEqual({});
  });
});

describe('parseInteger', () => {
  it('should parse whole numbers', () => {
    expect(parseInteger('45')).toBe(45);
  });

  it('should reject fractions and words', () => {
    expect(() => parseInteger('4.5')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('many')).toThrow(InvalidArgumentError);
  });
});

describe('createProgram', () => {
  it('should register generate, study and list', () => {
    const program = createProgram();
    expect(program.name()).toBe('quarry');
    expect(program.commands.map((c) => c.name())).toEqual(['generate', 'study', 'list']);
  });

  it('should give generate the count, url and store options', () => {
    const generate = createProgram().commands.find((c) => c.name() === 'generate');
    const flags = generate?.options.map((o) => o.long) ?? [];

    expect(flags).toEqual(
      expect.arrayContaining([
        '--count',
        '--url',
        '--urls-file',
        '--interview',
        '--user',
        '--seed',
        '--batch-size',
        '--db',
        '--concurrency',
        '--fetch-timeout',
        '--config',
        '--show-config',
        '--dry-run',
        '--no-color',
        '--verbose',
      ]),
    );
  });

  it('should default list --limit to 10', () => {
    const list = createProgram().commands.find((c) => c.name() === 'list');
    const limit = list?.options.find((o) => o.long === '--limit');
    expect(limit?.defaultValue).toBe(10);
  });
});
