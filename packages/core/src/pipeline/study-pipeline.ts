/**
 * Study Pipeline
 *
 * Prepares question/answer pairs for reading practice. Each answer is a
 * paraphrase of the opening of a fetched source, so it can be read next to
 * the question without reproducing the page verbatim.
 */

import type { LanguageServices, RandomSource, SourceUnit, StudyPair } from '@quarry/types';

import { composeQuestion, selectParagraph } from '../composer/index.js';
import { CURATED_SOURCES, curatedUrlsFor, type CuratedSourceMap } from '../corpus/curated-sources.js';
import type { UnavailableSource, UnitFetcher } from '../corpus/unit-fetcher.js';
import { GenerationCancelledError, NoSourcesError } from '../errors.js';
import { Paraphraser, type ParaphraseConfig } from '../paraphrase/index.js';
import { createRandomSource, pickOne } from '../random/index.js';
import { SalienceExtractor, type SalienceConfig } from '../salience/index.js';
import { validateStudyRequest } from '../validation/index.js';

/**
 * Study configuration
 */
export interface StudyConfig extends SalienceConfig, ParaphraseConfig {
  /** Characters kept from a caller-supplied page (default 4000) */
  sourceMaxChars?: number;
  /** Characters kept from each curated page (default 3000) */
  defaultSourceMaxChars?: number;
  /** Leading characters of a source that are paraphrased into the answer (default 400) */
  answerChars?: number;
  /** Leading paragraphs a question may be drawn from (default 5) */
  paragraphWindow?: number;
  curatedSources?: CuratedSourceMap;
}

/**
 * Per-run options
 */
export interface StudyRun {
  random?: RandomSource;
  signal?: AbortSignal;
  /** Called for each source that could not be read */
  onUnavailable?: (source: UnavailableSource) => void;
}

/**
 * Prepared pairs and the sources they were drawn from
 */
export interface StudyResult {
  topic: string;
  sources: SourceUnit[];
  pairs: StudyPair[];
}

/**
 * Builds study pairs from a single page or the curated pages of a topic
 */
export class StudyPipeline {
  private readonly extractor: SalienceExtractor;
  private readonly paraphraser: Paraphraser;
  private readonly sourceMaxChars: number;
  private readonly defaultSourceMaxChars: number;
  private readonly answerChars: number;
  private readonly paragraphWindow: number;
  private readonly curatedSources: CuratedSourceMap;

  constructor(
    language: LanguageServices,
    private readonly unitFetcher: UnitFetcher,
    config: StudyConfig = {},
  ) {
    this.extractor = new SalienceExtractor(language.tokenizer, language.tagger, config);
    this.paraphraser = new Paraphraser(language, config);
    this.sourceMaxChars = config.sourceMaxChars ?? 4000;
    this.defaultSourceMaxChars = config.defaultSourceMaxChars ?? 3000;
    this.answerChars = config.answerChars ?? 400;
    this.paragraphWindow = config.paragraphWindow ?? 5;
    this.curatedSources = config.curatedSources ?? CURATED_SOURCES;
  }

  /**
   * Prepare `pairCount` pairs
   *
   * @throws InvalidRequestError when the request is malformed
   * @throws NoSourcesError when neither the page nor any curated page could be read
   */
  async prepare(input: unknown, run: StudyRun = {}): Promise<StudyResult> {
    const request = validateStudyRequest(input);
    const { topic, pairCount } = request;
    const random = run.random ?? createRandomSource();

    const urls = request.url !== undefined ? [request.url] : [...curatedUrlsFor(topic, this.curatedSources)];
    const maxChars = request.url !== undefined ? this.sourceMaxChars : this.defaultSourceMaxChars;

    const fetched = await this.unitFetcher.fetchAll(urls, maxChars, run.signal);
    for (const source of fetched.unavailable) {
      run.onUnavailable?.(source);
    }
    if (run.signal?.aborted) {
      throw new GenerationCancelledError(0, pairCount);
    }
    if (fetched.units.length === 0) {
      throw new NoSourcesError(topic, urls);
    }

    const pairs: StudyPair[] = [];
    for (let i = 0; i < pairCount; i++) {
      if (run.signal?.aborted) {
        throw new GenerationCancelledError(0, pairCount);
      }
      const unit = pickOne(random, fetched.units);
      if (unit === undefined) {
        throw new NoSourcesError(topic, urls);
      }

      const paragraph = selectParagraph(unit.text, random, this.paragraphWindow);
      const question = composeQuestion(paragraph, topic, this.extractor.extractTerms(paragraph));
      const answer = await this.paraphraser.paraphrase(unit.text.slice(0, this.answerChars), random);
      pairs.push({ topic, question, answer, sourceIdentifier: unit.identifier });
    }

    return { topic, sources: fetched.units, pairs };
  }
}
