/**
 * Service initialization and health checking
 */

import { HttpSourceFetcher, type FetchFailure } from '@quarry/fetcher';
import { getLanguageServices } from '@quarry/language';
import { SqliteQuestionStore } from '@quarry/store';
import type { LanguageServices, QuestionStore, SourceFetcher } from '@quarry/types';

import type { QuarryConfig } from '../config/schema.js';
import { ServiceError } from '../errors/index.js';
import type { ServiceStatus } from '../progress/reporter.js';

/**
 * Initialized services container
 */
export interface Services {
  language: LanguageServices;
  fetcher: SourceFetcher;
  store: QuestionStore;
  close: () => void;
}

/**
 * Hooks wired into the concrete services
 */
export interface ServiceHooks {
  onFetchFailure?: (failure: FetchFailure) => void;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check that the tokenizer, tagger and lexicon load
 */
function checkLanguage(): ServiceStatus {
  const startTime = Date.now();
  try {
    getLanguageServices();
    return { name: 'Language resources', healthy: true, latencyMs: Date.now() - startTime };
  } catch (error) {
    return { name: 'Language resources', healthy: false, error: errorMessage(error) };
  }
}

/**
 * Check that the question store opens and answers a query
 */
async function checkStore(config: QuarryConfig): Promise<ServiceStatus> {
  const name = `Question store (${config.store.dbPath})`;
  const startTime = Date.now();
  const store = new SqliteQuestionStore({ dbPath: config.store.dbPath });

  try {
    const healthy = await store.healthCheck();
    if (healthy) {
      return { name, healthy: true, latencyMs: Date.now() - startTime };
    }
    return { name, healthy: false, error: 'unhealthy response' };
  } catch (error) {
    return { name, healthy: false, error: errorMessage(error) };
  } finally {
    store.close();
  }
}

/**
 * Perform all health checks
 */
export async function performHealthChecks(config: QuarryConfig): Promise<ServiceStatus[]> {
  return [checkLanguage(), await checkStore(config)];
}

/**
 * Initialize all services based on config.
 * Language resources load eagerly so a broken install fails before any fetch.
 */
export async function initializeServices(
  config: QuarryConfig,
  hooks: ServiceHooks = {},
): Promise<Services> {
  const language = getLanguageServices();

  const store = new SqliteQuestionStore({ dbPath: config.store.dbPath });
  const healthy = await store.healthCheck();
  if (!healthy) {
    store.close();
    throw new ServiceError(
      'Question store',
      `Store at ${config.store.dbPath} did not answer a health check`,
      'Check the --db path and its permissions',
    );
  }

  const fetcher = new HttpSourceFetcher({
    timeoutMs: config.fetch.timeoutMs,
    userAgent: config.fetch.userAgent,
    onFailure: hooks.onFetchFailure,
  });

  return {
    language,
    fetcher,
    store,
    close: () => store.close(),
  };
}

/**
 * Close all services
 */
export function closeServices(services: Services): void {
  services.close();
}
