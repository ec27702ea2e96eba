import { describe, it, expect } from 'vitest';

import {
  EmptyCorpusError,
  GenerationCancelledError,
  GenerationError,
  GenerationErrorCode,
  InvalidRequestError,
  NoSourcesError,
  PersistenceError,
} from '../errors.js';

describe('Generation Errors', () => {
  describe('GenerationError', () => {
    it('should carry a code and optional cause', () => {
      const cause = new Error('root');
      const error = new GenerationError('failed', GenerationErrorCode.EMPTY_CORPUS, cause);

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('GenerationError');
      expect(error.code).toBe(GenerationErrorCode.EMPTY_CORPUS);
      expect(error.cause).toBe(cause);
    });
  });

  describe('InvalidRequestError', () => {
    it('should join issues into its message', () => {
      const error = new InvalidRequestError([
        { path: 'topic', message: 'topic must not be blank' },
        { path: '', message: 'Required' },
      ]);

      expect(error.name).toBe('InvalidRequestError');
      expect(error.code).toBe(GenerationErrorCode.INVALID_REQUEST);
      expect(error.message).toBe('Invalid request: topic: topic must not be blank; request: Required');
    });
  });

  describe('EmptyCorpusError', () => {
    it('should name the topic', () => {
      const error = new EmptyCorpusError('DevOps');
      expect(error.message).toBe('Seed corpus for "DevOps" is empty');
      expect(error).toBeInstanceOf(GenerationError);
    });
  });

  describe('PersistenceError', () => {
    it('should describe the failing batch without a cause', () => {
      const error = new PersistenceError(0, 0, 30);

      expect(error.message).toBe('Failed to persist batch 1: 0 of 30 questions were stored');
      expect(error.code).toBe(GenerationErrorCode.PERSISTENCE_FAILED);
      expect(error.cause).toBeUndefined();
    });
  });

  describe('GenerationCancelledError', () => {
    it('should report the persisted count', () => {
      const error = new GenerationCancelledError(45, 60);

      expect(error.message).toBe('Generation cancelled after 45 of 60 questions were stored');
      expect(error.code).toBe(GenerationErrorCode.CANCELLED);
    });
  });

  describe('NoSourcesError', () => {
    it('should count attempted URLs', () => {
      const error = new NoSourcesError('Cloud', ['https://a.test/']);

      expect(error.message).toBe('No sources could be fetched for "Cloud" (tried 1 URL(s))');
      expect(error.code).toBe(GenerationErrorCode.NO_SOURCES);
    });
  });
});
