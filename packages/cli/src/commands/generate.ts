/**
 * Generate command implementation
 */

import { randomInt } from 'node:crypto';

import { parseCliOptions, VERSION } from '../cli.js';
import { loadConfig } from '../config/loader.js';
import { handleError } from '../errors/index.js';
import { orchestrateGeneration, PREVIEW_LIMIT } from '../orchestrator/orchestrator.js';
import {
  performHealthChecks,
  initializeServices,
  closeServices,
} from '../orchestrator/services.js';
import { ProgressReporter } from '../progress/reporter.js';

import { createInterruptController, printConfig, readUrlsFile } from './shared.js';

/**
 * User id for interviews created without --user
 */
export function guestUserId(): string {
  return `guest_${randomInt(1000, 10000)}`;
}

/**
 * Main generate command handler
 */
export async function generateCommand(
  topic: string,
  rawOptions: Record<string, unknown>,
): Promise<void> {
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

    const seedUrls = [
      ...(options.urls ?? []),
      ...(options.urlsFile !== undefined ? readUrlsFile(options.urlsFile) : []),
    ];
    const requestedCount = options.count ?? config.generation.defaultCount;

    const healthStatus = await performHealthChecks(config);
    reporter.reportServiceStatus(healthStatus);

    if (options.dryRun) {
      reporter.printMessage('Dry-run mode: validating setup...');
      reporter.printMessage('');

      const unhealthy = healthStatus.filter((s) => !s.healthy);
      if (unhealthy.length === 0) {
        reporter.printSuccess('All services healthy. Ready to generate.');
      } else {
        reporter.printWarning('Some services unavailable:');
        for (const service of unhealthy) {
          reporter.printMessage(`  - ${service.name}: ${service.error ?? 'unknown error'}`);
        }
      }

      reporter.printMessage(`Topic: ${topic}`);
      reporter.printMessage(`Questions: ${requestedCount}`);
      reporter.printMessage(`Seed URLs: ${seedUrls.length}`);
      reporter.printMessage('');
      reporter.printMessage('Dry-run complete. No questions were generated.');
      return;
    }

    const services = await initializeServices(config, {
      onFetchFailure: (failure) => reporter.verbose(`${failure.url}: ${failure.error.message}`),
    });
    const interrupt = createInterruptController(() =>
      reporter.warn('Interrupted; stopping after the current question'),
    );

    try {
      reporter.startRun();
      const { result, preview } = await orchestrateGeneration(
        {
          topic,
          requestedCount,
          seedUrls,
          interviewId: options.interview,
          userId: options.user ?? guestUserId(),
          seed: options.seed,
          signal: interrupt.signal,
        },
        config,
        services,
        reporter,
      );

      reporter.printSummary({
        topic: result.topic,
        interviewId: result.interviewId,
        persistedCount: result.persistedCount,
        batchCount: result.batchCount,
        origin: result.corpus.origin,
        unitCount: result.corpus.units.length,
      });
      reporter.printQuestions(preview, `First ${Math.min(PREVIEW_LIMIT, preview.length)} questions:`);
    } finally {
      interrupt.dispose();
      closeServices(services);
    }
  } catch (error) {
    reporter.stop();
    handleError(error);
  }
}
