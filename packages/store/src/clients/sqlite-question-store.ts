/**
 * SQLite question store
 */

import { randomUUID } from 'node:crypto';

import type Database from 'better-sqlite3';
import type { GeneratedQuestion, QuestionStore, StoredQuestion } from '@quarry/types';

import { InterviewNotFoundError, QueryError, StoreError } from '../errors.js';

import { BaseDatabaseClient, type DatabaseClientConfig } from './base.js';

/**
 * Default configuration for the question store
 */
export const DEFAULT_STORE_CONFIG: DatabaseClientConfig = {
  dbPath: 'quarry.db',
  timeoutMs: 5000,
};

/**
 * Store configuration
 */
export interface QuestionStoreConfig extends DatabaseClientConfig {
  /** Clock for created/generated timestamps */
  now?: () => Date;
  /** Id generator for interviews and questions */
  generateId?: () => string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS interviews (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS questions (
    id TEXT PRIMARY KEY,
    interview_id TEXT NOT NULL REFERENCES interviews(id) ON DELETE CASCADE,
    topic TEXT NOT NULL,
    q_text TEXT NOT NULL,
    source_url TEXT NOT NULL,
    generated_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_questions_interview ON questions(interview_id);
`;

/**
 * Raw row from the questions table
 */
interface RawQuestionRow {
  id: string;
  interview_id: string;
  topic: string;
  q_text: string;
  source_url: string;
  generated_at: string;
}

/**
 * Raw row from the interviews table
 */
interface RawInterviewRow {
  id: string;
  user_id: string;
  created_at: string;
}

/**
 * An interview as stored
 */
export interface StoredInterview {
  id: string;
  userId: string;
  createdAt: string;
}

/**
 * Transform a raw database row to StoredQuestion
 */
function rowToQuestion(row: RawQuestionRow): StoredQuestion {
  return {
    id: row.id,
    interviewId: row.interview_id,
    topic: row.topic,
    text: row.q_text,
    sourceIdentifier: row.source_url,
    generatedAt: row.generated_at,
  };
}

/**
 * Question store backed by a local SQLite file
 */
export class SqliteQuestionStore extends BaseDatabaseClient implements QuestionStore {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(config: Partial<QuestionStoreConfig> = {}) {
    const { now, generateId, ...dbConfig } = config;
    super({
      ...DEFAULT_STORE_CONFIG,
      ...dbConfig,
    });
    this.now = now ?? (() => new Date());
    this.generateId = generateId ?? randomUUID;
  }

  protected migrate(db: Database.Database): void {
    db.exec(SCHEMA);
  }

  /**
   * Create an interview for a user and return its id
   */
  async createInterview(userId: string): Promise<string> {
    const db = this.ensureConnected();
    const id = this.generateId();

    this.run('createInterview', () =>
      db
        .prepare<[string, string, string]>('INSERT INTO interviews (id, user_id, created_at) VALUES (?, ?, ?)')
        .run(id, userId, this.now().toISOString()),
    );

    return id;
  }

  /**
   * Insert a batch of questions in one transaction.
   * The topic argument is stored on every row.
   */
  async insertBatch(
    records: readonly GeneratedQuestion[],
    interviewId: string,
    topic: string,
  ): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const db = this.ensureConnected();
    const generatedAt = this.now().toISOString();
    const insert = db.prepare<[string, string, string, string, string, string]>(`
      INSERT INTO questions (id, interview_id, topic, q_text, source_url, generated_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    const insertAll = db.transaction((batch: readonly GeneratedQuestion[]) => {
      for (const record of batch) {
        insert.run(this.generateId(), interviewId, topic, record.text, record.sourceIdentifier, generatedAt);
      }
    });

    this.run('insertBatch', () => insertAll(records));
  }

  /**
   * Questions of an interview in insertion order
   */
  async listQuestions(interviewId: string, limit?: number): Promise<StoredQuestion[]> {
    const db = this.ensureConnected();
    const rows =
      limit === undefined
        ? db
            .prepare<[string], RawQuestionRow>('SELECT * FROM questions WHERE interview_id = ? ORDER BY rowid')
            .all(interviewId)
        : db
            .prepare<[string, number], RawQuestionRow>(
              'SELECT * FROM questions WHERE interview_id = ? ORDER BY rowid LIMIT ?',
            )
            .all(interviewId, limit);
    return rows.map(rowToQuestion);
  }

  /**
   * Number of questions stored for an interview
   */
  async hasInterview(interviewId: string): Promise<boolean> {
    const db = this.ensureConnected();
    const row = db
      .prepare<[string], { id: string }>('SELECT id FROM interviews WHERE id = ?')
      .get(interviewId);
    return row !== undefined;
  }

  async countQuestions(interviewId: string): Promise<number> {
    const db = this.ensureConnected();
    const row = db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM questions WHERE interview_id = ?')
      .get(interviewId);
    return row?.count ?? 0;
  }

  /**
   * Look up an interview
   *
   * @throws InterviewNotFoundError when the id is unknown
   */
  async getInterview(interviewId: string): Promise<StoredInterview> {
    const db = this.ensureConnected();
    const row = db
      .prepare<[string], RawInterviewRow>('SELECT * FROM interviews WHERE id = ?')
      .get(interviewId);
    if (!row) {
      throw new InterviewNotFoundError(interviewId);
    }
    return { id: row.id, userId: row.user_id, createdAt: row.created_at };
  }

  /**
   * Verify the database opens and its schema is in place
   */
  async healthCheck(): Promise<boolean> {
    const db = this.ensureConnected();
    const row = db.prepare<[], { ok: number }>('SELECT 1 AS ok').get();
    return row?.ok === 1;
  }

  private run<T>(operation: string, statement: () => T): T {
    try {
      return statement();
    } catch (err) {
      if (err instanceof StoreError) throw err;
      throw new QueryError(operation, err instanceof Error ? err : new Error(String(err)));
    }
  }
}
