/**
 * Coordinates a generation or study run against initialized services
 */

import {
  createGenerationPipeline,
  createRandomSource,
  createSeedCorpusBuilder,
  mergeCuratedSources,
  StudyPipeline,
  UnitFetcher,
  validateGenerationRequest,
  type CorpusObserver,
  type GenerationResult,
  type StudyResult,
  type UnavailableSource,
} from '@quarry/core';
import { InterviewNotFoundError } from '@quarry/store';
import type { GeneratedQuestion, QuestionStore, StoredQuestion } from '@quarry/types';

import type { QuarryConfig } from '../config/schema.js';
import type { ProgressReporter } from '../progress/reporter.js';
import { createPipelineProgressCallback } from '../progress/reporter.js';

import type { Services } from './services.js';

/** Questions shown after a generation run */
export const PREVIEW_LIMIT = 10;

/**
 * One generation run as requested on the command line
 */
export interface GenerationJob {
  topic: string;
  requestedCount: number;
  seedUrls: string[];
  /** Append to this interview instead of creating one */
  interviewId?: string;
  /** Owner of a newly created interview */
  userId: string;
  seed?: number;
  signal?: AbortSignal;
}

export interface GenerationOutcome {
  result: GenerationResult;
  preview: StoredQuestion[];
}

/**
 * One study run as requested on the command line
 */
export interface StudyJob {
  topic: string;
  url?: string;
  pairCount: number;
  /** Also store the questions under this interview */
  interviewId?: string;
  seed?: number;
  signal?: AbortSignal;
}

export interface StudyOutcome {
  result: StudyResult;
  persistedCount: number;
}

function describeUnavailable(source: UnavailableSource): string {
  const detail = source.error ? `: ${source.error.message}` : '';
  return `Skipped ${source.url} (${source.reason}${detail})`;
}

/**
 * Fail before any fetching when an explicit interview id is unknown
 */
async function requireInterview(store: QuestionStore, interviewId: string): Promise<void> {
  if (!(await store.hasInterview(interviewId))) {
    throw new InterviewNotFoundError(interviewId);
  }
}

/**
 * Generate, persist and preview questions for one topic
 */
export async function orchestrateGeneration(
  job: GenerationJob,
  config: QuarryConfig,
  services: Services,
  reporter: ProgressReporter,
): Promise<GenerationOutcome> {
  const request = validateGenerationRequest({
    topic: job.topic,
    requestedCount: job.requestedCount,
    seedUrls: job.seedUrls,
  });

  let interviewId = job.interviewId;
  if (interviewId !== undefined) {
    await requireInterview(services.store, interviewId);
  } else {
    interviewId = await services.store.createInterview(job.userId);
    reporter.verbose(`Created interview ${interviewId} for ${job.userId}`);
  }

  const observer: CorpusObserver = {
    onUnavailable: (source) => reporter.verbose(describeUnavailable(source)),
    onStrategyComplete: (origin, unitCount) =>
      reporter.verbose(`Using ${unitCount} source(s) from ${origin}`),
  };

  const corpusBuilder = createSeedCorpusBuilder(
    services.fetcher,
    {
      timeoutMs: config.fetch.timeoutMs,
      concurrency: config.fetch.concurrency,
      maxChars: config.fetch.maxChars,
      curatedSources: mergeCuratedSources(config.sources.curated),
    },
    observer,
  );

  const pipeline = createGenerationPipeline(
    services.language,
    corpusBuilder,
    services.store,
    { ...config.generation, ...config.paraphrase },
    createPipelineProgressCallback(reporter),
  );

  const result = await pipeline.generate(request, {
    interviewId,
    random: createRandomSource(job.seed),
    signal: job.signal,
  });

  if (result.corpus.origin === 'local-fallback') {
    reporter.warn('No source could be read; every question uses the generic template');
  } else if (result.corpus.unavailable.length > 0) {
    reporter.warn(`${result.corpus.unavailable.length} source(s) could not be read`);
  }

  const preview = await services.store.listQuestions(interviewId, PREVIEW_LIMIT);
  return { result, preview };
}

/**
 * Prepare study pairs, optionally storing their questions
 */
export async function orchestrateStudy(
  job: StudyJob,
  config: QuarryConfig,
  services: Services,
  reporter: ProgressReporter,
): Promise<StudyOutcome> {
  if (job.interviewId !== undefined) {
    await requireInterview(services.store, job.interviewId);
  }

  const unitFetcher = new UnitFetcher(services.fetcher, {
    timeoutMs: config.fetch.timeoutMs,
    concurrency: config.fetch.concurrency,
  });

  const pipeline = new StudyPipeline(services.language, unitFetcher, {
    ...config.study,
    ...config.paraphrase,
    paragraphWindow: config.generation.paragraphWindow,
    maxTerms: config.generation.maxTerms,
    minTermLength: config.generation.minTermLength,
    curatedSources: mergeCuratedSources(config.sources.curated),
  });

  reporter.startPhase('study');
  const result = await pipeline.prepare(
    { topic: job.topic, url: job.url, pairCount: job.pairCount },
    {
      random: createRandomSource(job.seed),
      signal: job.signal,
      onUnavailable: (source) => reporter.verbose(describeUnavailable(source)),
    },
  );
  reporter.completePhase(
    'study',
    `${result.pairs.length} pairs from ${result.sources.length} source(s)`,
  );

  let persistedCount = 0;
  if (job.interviewId !== undefined) {
    const records: GeneratedQuestion[] = result.pairs.map((pair) => ({
      topic: pair.topic,
      text: pair.question,
      sourceIdentifier: pair.sourceIdentifier,
    }));
    await services.store.insertBatch(records, job.interviewId, result.topic);
    persistedCount = records.length;
    reporter.verbose(`Stored ${persistedCount} questions under ${job.interviewId}`);
  }

  return { result, persistedCount };
}
