/**
 * Request validation
 *
 * Requests are checked before any fetch or composition starts.
 */

import { QUESTION_COUNT_LIMITS, STUDY_PAIR_LIMITS } from '@quarry/types';
import type { GenerationRequest, StudyRequest } from '@quarry/types';
import { z } from 'zod';

import { InvalidRequestError } from '../errors.js';

const topicSchema = z
  .string({ invalid_type_error: 'topic must be a string' })
  .trim()
  .min(1, 'topic must not be blank');

export const generationRequestSchema = z.object({
  topic: topicSchema,
  requestedCount: z
    .number({ invalid_type_error: 'requestedCount must be a number' })
    .int('requestedCount must be an integer')
    .min(QUESTION_COUNT_LIMITS.min, `requestedCount must be at least ${QUESTION_COUNT_LIMITS.min}`)
    .max(QUESTION_COUNT_LIMITS.max, `requestedCount must be at most ${QUESTION_COUNT_LIMITS.max}`),
  seedUrls: z.array(z.string({ invalid_type_error: 'seed URLs must be strings' })).default([]),
});

export const studyRequestSchema = z.object({
  topic: topicSchema,
  url: z.string().trim().url('url must be a valid URL').optional(),
  pairCount: z
    .number({ invalid_type_error: 'pairCount must be a number' })
    .int('pairCount must be an integer')
    .min(STUDY_PAIR_LIMITS.min, `pairCount must be at least ${STUDY_PAIR_LIMITS.min}`)
    .max(STUDY_PAIR_LIMITS.max, `pairCount must be at most ${STUDY_PAIR_LIMITS.max}`),
});

function toInvalidRequest(error: z.ZodError): InvalidRequestError {
  return new InvalidRequestError(
    error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  );
}

/**
 * Validate a generation request. The topic is trimmed.
 *
 * @throws InvalidRequestError listing every issue
 */
export function validateGenerationRequest(input: unknown): GenerationRequest {
  const result = generationRequestSchema.safeParse(input);
  if (!result.success) {
    throw toInvalidRequest(result.error);
  }
  return result.data;
}

/**
 * Validate a study request
 *
 * @throws InvalidRequestError listing every issue
 */
export function validateStudyRequest(input: unknown): StudyRequest {
  const result = studyRequestSchema.safeParse(input);
  if (!result.success) {
    throw toInvalidRequest(result.error);
  }
  const { topic, url, pairCount } = result.data;
  return url === undefined ? { topic, pairCount } : { topic, url, pairCount };
}
