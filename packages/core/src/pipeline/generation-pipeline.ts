/**
 * Generation Pipeline
 *
 * Drives one generation request:
 * 1. Validate the request
 * 2. Build the seed corpus (seed URLs, curated defaults, local fallback)
 * 3. For each slot: sample a unit, select a paragraph, extract terms,
 *    compose and paraphrase a question
 * 4. Flush pending questions to the store every `batchSize` questions,
 *    then flush the remainder
 */

import type {
  GeneratedQuestion,
  LanguageServices,
  QuestionStore,
  RandomSource,
  SeedCorpus,
} from '@quarry/types';

import { composeQuestion, selectParagraph } from '../composer/index.js';
import type { SeedCorpusBuilder } from '../corpus/index.js';
import { EmptyCorpusError, GenerationCancelledError, PersistenceError } from '../errors.js';
import { Paraphraser, type ParaphraseConfig } from '../paraphrase/index.js';
import { createRandomSource, pickOne } from '../random/index.js';
import { SalienceExtractor, type SalienceConfig } from '../salience/index.js';
import { validateGenerationRequest } from '../validation/index.js';

/**
 * Generation configuration
 */
export interface GenerationConfig extends SalienceConfig, ParaphraseConfig {
  /** Questions per store write (default 15) */
  batchSize?: number;
  /** Leading paragraphs a question may be drawn from (default 5) */
  paragraphWindow?: number;
}

const DEFAULT_CONFIG: Required<Pick<GenerationConfig, 'batchSize' | 'paragraphWindow'>> = {
  batchSize: 15,
  paragraphWindow: 5,
};

/**
 * Per-run inputs supplied by the caller
 */
export interface GenerationRun {
  /** Interview the questions are stored under */
  interviewId: string;
  /** Random source; a fresh unseeded one when absent */
  random?: RandomSource;
  /** Cancels the run; flushed batches stay stored */
  signal?: AbortSignal;
}

/**
 * Outcome of a completed run
 */
export interface GenerationResult {
  interviewId: string;
  topic: string;
  persistedCount: number;
  /** Number of store writes */
  batchCount: number;
  corpus: SeedCorpus;
}

/**
 * Generation progress callback.
 * Phases: 'corpus', 'compose' and 'persist'.
 */
export type ProgressCallback = (phase: string, current: number, total: number) => void;

/**
 * Main generation pipeline
 */
export class GenerationPipeline {
  private readonly extractor: SalienceExtractor;
  private readonly paraphraser: Paraphraser;
  private readonly batchSize: number;
  private readonly paragraphWindow: number;
  private onProgress?: ProgressCallback;

  constructor(
    language: LanguageServices,
    private readonly corpusBuilder: SeedCorpusBuilder,
    private readonly store: QuestionStore,
    config: GenerationConfig = {},
    onProgress?: ProgressCallback,
  ) {
    const { batchSize, paragraphWindow } = { ...DEFAULT_CONFIG, ...config };
    this.batchSize = Math.max(1, batchSize);
    this.paragraphWindow = Math.max(1, paragraphWindow);
    this.extractor = new SalienceExtractor(language.tokenizer, language.tagger, config);
    this.paraphraser = new Paraphraser(language, config);
    if (onProgress !== undefined) {
      this.onProgress = onProgress;
    }
  }

  /**
   * Generate and persist exactly `requestedCount` questions
   *
   * @throws InvalidRequestError before any work when the request is malformed
   * @throws PersistenceError when a flush fails
   * @throws GenerationCancelledError when the signal aborts
   */
  async generate(input: unknown, run: GenerationRun): Promise<GenerationResult> {
    const request = validateGenerationRequest(input);
    const { topic, requestedCount } = request;
    const random = run.random ?? createRandomSource();
    const { signal } = run;

    this.throwIfCancelled(signal, 0, requestedCount);

    this.reportProgress('corpus', 0, 1);
    const corpus = await this.corpusBuilder.build(topic, request.seedUrls, signal);
    this.reportProgress('corpus', 1, 1);
    if (corpus.units.length === 0) {
      throw new EmptyCorpusError(topic);
    }

    let pending: GeneratedQuestion[] = [];
    let persistedCount = 0;
    let batchCount = 0;

    const flush = async (): Promise<void> => {
      if (pending.length === 0) return;
      try {
        await this.store.insertBatch(pending, run.interviewId, topic);
      } catch (error) {
        throw new PersistenceError(
          persistedCount,
          batchCount,
          requestedCount,
          error instanceof Error ? error : new Error(String(error)),
        );
      }
      persistedCount += pending.length;
      batchCount++;
      pending = [];
      this.reportProgress('persist', persistedCount, requestedCount);
    };

    for (let i = 0; i < requestedCount; i++) {
      this.throwIfCancelled(signal, persistedCount, requestedCount);

      pending.push(await this.composeOne(corpus, topic, random));
      this.reportProgress('compose', i + 1, requestedCount);

      if (pending.length >= this.batchSize) {
        await flush();
      }
    }

    this.throwIfCancelled(signal, persistedCount, requestedCount);
    await flush();

    return { interviewId: run.interviewId, topic, persistedCount, batchCount, corpus };
  }

  /**
   * Compose and paraphrase the question for one slot
   */
  private async composeOne(
    corpus: SeedCorpus,
    topic: string,
    random: RandomSource,
  ): Promise<GeneratedQuestion> {
    const unit = pickOne(random, corpus.units);
    if (unit === undefined) {
      throw new EmptyCorpusError(topic);
    }

    const paragraph = selectParagraph(unit.text, random, this.paragraphWindow);
    const terms = this.extractor.extractTerms(paragraph);
    const question = composeQuestion(paragraph, topic, terms);
    const text = await this.paraphraser.paraphrase(question, random);

    return { topic, text, sourceIdentifier: unit.identifier };
  }

  private throwIfCancelled(signal: AbortSignal | undefined, persisted: number, requested: number): void {
    if (signal?.aborted) {
      throw new GenerationCancelledError(persisted, requested);
    }
  }

  /**
   * Report progress
   */
  private reportProgress(phase: string, current: number, total: number): void {
    if (this.onProgress) {
      this.onProgress(phase, current, total);
    }
  }
}

/**
 * Create a generation pipeline
 */
export function createGenerationPipeline(
  language: LanguageServices,
  corpusBuilder: SeedCorpusBuilder,
  store: QuestionStore,
  config?: GenerationConfig,
  onProgress?: ProgressCallback,
): GenerationPipeline {
  return new GenerationPipeline(language, corpusBuilder, store, config, onProgress);
}
