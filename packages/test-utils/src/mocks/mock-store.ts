/**
 * In-memory question store for testing
 */

import { vi } from 'vitest';
import type { GeneratedQuestion, QuestionStore, StoredQuestion } from '@quarry/types';

export interface MockStoreConfig {
  /** Zero-based index of the insertBatch call that rejects */
  failOnBatch?: number;
  /** Error thrown by the failing call */
  failureError?: Error;
}

/**
 * Question store keeping everything in arrays.
 * `batches` records each insertBatch call in order.
 */
export class InMemoryQuestionStore implements QuestionStore {
  readonly batches: Array<{ interviewId: string; topic: string; records: GeneratedQuestion[] }> = [];
  readonly interviews = new Map<string, string>();
  private readonly questions: StoredQuestion[] = [];
  private calls = 0;
  private nextId = 1;

  constructor(private readonly config: MockStoreConfig = {}) {}

  async createInterview(userId: string): Promise<string> {
    const id = `interview-${this.interviews.size + 1}`;
    this.interviews.set(id, userId);
    return id;
  }

  async hasInterview(interviewId: string): Promise<boolean> {
    return this.interviews.has(interviewId);
  }

  async insertBatch(
    records: readonly GeneratedQuestion[],
    interviewId: string,
    topic: string,
  ): Promise<void> {
    const call = this.calls++;
    if (this.config.failOnBatch === call) {
      throw this.config.failureError ?? new Error('Simulated store failure');
    }

    this.batches.push({ interviewId, topic, records: [...records] });
    for (const record of records) {
      this.questions.push({
        ...record,
        id: `question-${this.nextId++}`,
        interviewId,
        generatedAt: '2024-01-01T00:00:00.000Z',
      });
    }
  }

  async listQuestions(interviewId: string, limit?: number): Promise<StoredQuestion[]> {
    const matching = this.questions.filter((q) => q.interviewId === interviewId);
    return limit === undefined ? matching : matching.slice(0, limit);
  }

  async countQuestions(interviewId: string): Promise<number> {
    return this.questions.filter((q) => q.interviewId === interviewId).length;
  }

  /** Every stored question across interviews */
  all(): StoredQuestion[] {
    return [...this.questions];
  }
}

/**
 * Create an in-memory store with spies on its writes
 */
export function createMockStore(config: MockStoreConfig = {}): InMemoryQuestionStore {
  const store = new InMemoryQuestionStore(config);
  vi.spyOn(store, 'insertBatch');
  vi.spyOn(store, 'createInterview');
  return store;
}
