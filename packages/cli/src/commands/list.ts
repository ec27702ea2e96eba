/**
 * List command implementation
 */

import { SqliteQuestionStore } from '@quarry/store';

import { parseCliOptions } from '../cli.js';
import { loadConfig } from '../config/loader.js';
import { handleError } from '../errors/index.js';
import { ProgressReporter } from '../progress/reporter.js';

import { printConfig } from './shared.js';

/**
 * Print the stored questions of an interview in insertion order
 */
export async function listCommand(
  interviewId: string,
  rawOptions: Record<string, unknown>,
): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const reporter = new ProgressReporter({ color: !options.noColor });

  try {
    const config = await loadConfig(options);

    if (options.showConfig) {
      printConfig(config);
      return;
    }

    const store = new SqliteQuestionStore({ dbPath: config.store.dbPath });
    try {
      const interview = await store.getInterview(interviewId);
      const total = await store.countQuestions(interviewId);
      const questions = await store.listQuestions(interviewId, options.limit);
      reporter.printQuestions(
        questions,
        `Interview ${interview.id} (${interview.userId}, ${total} questions):`,
      );
    } finally {
      store.close();
    }
  } catch (error) {
    reporter.stop();
    handleError(error);
  }
}
