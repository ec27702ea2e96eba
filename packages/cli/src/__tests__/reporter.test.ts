/**
 * Progress reporter tests
 */

import type { StoredQuestion } from '@quarry/types';
import { afterEach, describe, it, expect, vi } from 'vitest';

import { ProgressReporter, createPipelineProgressCallback } from '../progress/reporter.js';

function question(text: string, sourceIdentifier: string): StoredQuestion {
  return {
    id: text,
    interviewId: 'interview-1',
    topic: 'Terraform',
    text,
    sourceIdentifier,
    generatedAt: '2024-01-01T00:00:00.000Z',
  };
}

describe('ProgressReporter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print numbered questions without colour', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const reporter = new ProgressReporter({ color: false });

    reporter.printQuestions(
      [question('First?', 'https://example.com/a'), question('Second?', 'local_fallback')],
      'Preview:',
    );

    expect(log.mock.calls.map((call) => call[0])).toEqual([
      '',
      'Preview:',
      'Q1. First?',
      '    https://example.com/a',
      'Q2. Second?',
    ]);
  });

  it('should print answers under their questions', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const reporter = new ProgressReporter({ color: false });

    reporter.printStudyPairs([
      {
        topic: 'Kubernetes',
        question: 'Why pods?',
        answer: 'Pods group containers .',
        sourceIdentifier: 'https://example.com/pods',
      },
    ]);

    expect(log.mock.calls.map((call) => call[0])).toEqual([
      '',
      'Q1. Why pods?',
      '    https://example.com/pods',
      'A1. Pods group containers .',
    ]);
  });

  it('should print verbose lines only when enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new ProgressReporter({ color: false }).verbose('hidden');
    new ProgressReporter({ color: false, verbose: true }).verbose('Stored 15/30 questions');

    expect(log.mock.calls.map((call) => call[0])).toEqual(['  Stored 15/30 questions']);
  });

  it('should print nothing when silent', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const reporter = new ProgressReporter({ silent: true, verbose: true });

    reporter.printHeader('0.1.0');
    reporter.warn('careful');
    reporter.verbose('detail');
    reporter.printQuestions([question('First?', 'local_fallback')]);

    expect(log).not.toHaveBeenCalled();
  });
});

describe('createPipelineProgressCallback', () => {
  it('should map pipeline phases onto reporter calls', () => {
    const reporter = new ProgressReporter({ silent: true });
    const startPhase = vi.spyOn(reporter, 'startPhase');
    const completePhase = vi.spyOn(reporter, 'completePhase');
    const updateProgress = vi.spyOn(reporter, 'updateProgress');
    const verbose = vi.spyOn(reporter, 'verbose');

    const onProgress = createPipelineProgressCallback(reporter);
    onProgress('corpus', 0, 1);
    onProgress('corpus', 1, 1);
    onProgress('compose', 1, 2);
    onProgress('compose', 2, 2);
    onProgress('persist', 2, 2);

    expect(startPhase.mock.calls).toEqual([['corpus'], ['compose']]);
    expect(completePhase.mock.calls).toEqual([['corpus'], ['compose', '2 questions']]);
    expect(updateProgress.mock.calls).toEqual([
      [1, 2],
      [2, 2],
    ]);
    expect(verbose).toHaveBeenCalledWith('Stored 2/2 questions');
  });
});
