import { describe, it, expect } from 'vitest';

import { ConnectionError, InterviewNotFoundError, QueryError, StoreError } from '../errors.js';

describe('Store Errors', () => {
  it('should create a base error with path', () => {
    const error = new StoreError('Test error', '/tmp/q.db');
    expect(error.message).toBe('Test error');
    expect(error.dbPath).toBe('/tmp/q.db');
    expect(error.name).toBe('StoreError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should include the cause in connection errors', () => {
    const error = new ConnectionError('/tmp/q.db', new Error('SQLITE_CANTOPEN'));
    expect(error.message).toBe('Failed to open question store at /tmp/q.db: SQLITE_CANTOPEN');
    expect(error).toBeInstanceOf(StoreError);
  });

  it('should name the failing operation', () => {
    const error = new QueryError('insertBatch', new Error('FOREIGN KEY constraint failed'));
    expect(error.message).toBe("Store operation 'insertBatch' failed: FOREIGN KEY constraint failed");
    expect(error.operation).toBe('insertBatch');
    expect(error.cause?.message).toBe('FOREIGN KEY constraint failed');
  });

  it('should carry the interview id', () => {
    const error = new InterviewNotFoundError('abc');
    expect(error.message).toBe('Interview not found: abc');
    expect(error.interviewId).toBe('abc');
  });
});
