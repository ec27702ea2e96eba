/**
 * Bounded, time-limited fetching of source units
 */

import pLimit from 'p-limit';
import type { SourceFetcher, SourceUnit } from '@quarry/types';

/**
 * Why a URL yielded no unit
 */
export type UnavailableReason = 'timeout' | 'empty' | 'error' | 'cancelled';

/**
 * Reported once per URL that yielded no unit
 */
export interface UnavailableSource {
  url: string;
  reason: UnavailableReason;
  error?: Error;
}

/**
 * Fetch limits
 */
export interface UnitFetchConfig {
  /** Per-fetch time bound in milliseconds */
  timeoutMs: number;
  /** Maximum fetches in flight */
  concurrency: number;
}

export const DEFAULT_UNIT_FETCH_CONFIG: UnitFetchConfig = {
  timeoutMs: 8000,
  concurrency: 4,
};

/**
 * Outcome of fetching a list of URLs
 */
export interface UnitFetchResult {
  /** Usable units, in input order */
  units: SourceUnit[];
  /** URLs without a usable unit, in input order */
  unavailable: UnavailableSource[];
}

export type FetchOutcome =
  | { status: 'ok'; unit: SourceUnit }
  | { status: 'unavailable'; source: UnavailableSource };

/**
 * Fetches URLs into source units, swallowing every per-URL failure
 */
export class UnitFetcher {
  private readonly config: UnitFetchConfig;

  constructor(
    private readonly fetcher: SourceFetcher,
    config: Partial<UnitFetchConfig> = {},
  ) {
    this.config = { ...DEFAULT_UNIT_FETCH_CONFIG, ...config };
  }

  /**
   * Fetch every URL with bounded concurrency
   */
  async fetchAll(urls: readonly string[], maxChars: number, signal?: AbortSignal): Promise<UnitFetchResult> {
    const limit = pLimit(Math.max(1, this.config.concurrency));
    const outcomes = await Promise.all(
      urls.map((url) => limit(() => this.fetchOne(url, maxChars, signal))),
    );

    const result: UnitFetchResult = { units: [], unavailable: [] };
    for (const outcome of outcomes) {
      if (outcome.status === 'ok') {
        result.units.push(outcome.unit);
      } else {
        result.unavailable.push(outcome.source);
      }
    }
    return result;
  }

  /**
   * Fetch a single URL, bounded by the configured timeout
   */
  async fetchOne(url: string, maxChars: number, signal?: AbortSignal): Promise<FetchOutcome> {
    if (signal?.aborted) {
      return unavailable(url, 'cancelled');
    }

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => {
        resolve('timeout');
        controller.abort();
      }, this.config.timeoutMs);
    });

    try {
      const text = await Promise.race([
        this.fetcher.fetch(url, { maxChars, signal: controller.signal }),
        timedOut,
      ]);

      if (text === 'timeout') {
        return unavailable(url, 'timeout');
      }
      if (signal?.aborted) {
        return unavailable(url, 'cancelled');
      }
      if (text === null || text.trim().length === 0) {
        return unavailable(url, 'empty');
      }
      return { status: 'ok', unit: { identifier: url, text } };
    } catch (error) {
      return unavailable(url, 'error', error instanceof Error ? error : new Error(String(error)));
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}

function unavailable(url: string, reason: UnavailableReason, error?: Error): FetchOutcome {
  const source: UnavailableSource = error ? { url, reason, error } : { url, reason };
  return { status: 'unavailable', source };
}
