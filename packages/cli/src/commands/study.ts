/**
 * Study command implementation
 */

import { parseCliOptions, VERSION } from '../cli.js';
import { loadConfig } from '../config/loader.js';
import { handleError } from '../errors/index.js';
import { orchestrateStudy } from '../orchestrator/orchestrator.js';
import { initializeServices, closeServices } from '../orchestrator/services.js';
import { ProgressReporter } from '../progress/reporter.js';

import { createInterruptController, printConfig } from './shared.js';

/**
 * Main study command handler
 */
export async function studyCommand(topic: string, rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const reporter = new ProgressReporter({
    color: !options.noColor,
    verbose: options.verbose ?? false,
  });

  try {
    const config = await loadConfig(options);

    if (options.showConfig) {
      printConfig(config);
      return;
    }

    reporter.printHeader(VERSION);

    const services = await initializeServices(config, {
      onFetchFailure: (failure) => reporter.verbose(`${failure.url}: ${failure.error.message}`),
    });
    const interrupt = createInterruptController(() => reporter.warn('Interrupted'));

    try {
      const { result, persistedCount } = await orchestrateStudy(
        {
          topic,
          url: options.urls?.[0],
          pairCount: options.pairs ?? config.study.defaultPairs,
          interviewId: options.interview,
          seed: options.seed,
          signal: interrupt.signal,
        },
        config,
        services,
        reporter,
      );

      reporter.printStudyPairs(result.pairs);
      if (persistedCount > 0 && options.interview !== undefined) {
        reporter.printMessage('');
        reporter.printSuccess(`Stored ${persistedCount} questions under ${options.interview}`);
      }
    } finally {
      interrupt.dispose();
      closeServices(services);
    }
  } catch (error) {
    reporter.stop();
    handleError(error);
  }
}
