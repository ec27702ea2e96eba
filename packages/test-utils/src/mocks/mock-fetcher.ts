/**
 * Mock source fetcher for testing
 */

import { vi } from 'vitest';
import type { FetchOptions } from '@quarry/types';

export interface MockFetcherConfig {
  /** Extracted text per URL; URLs missing here resolve to null */
  pages?: Record<string, string | null>;
  /** URLs whose fetch rejects */
  failureUrls?: Set<string>;
  /** URLs whose fetch never settles unless aborted */
  hangingUrls?: Set<string>;
  /** Simulate latency in milliseconds */
  latencyMs?: number;
}

/**
 * Create a mock fetcher implementing SourceFetcher
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createMockFetcher(config: MockFetcherConfig = {}) {
  const { pages = {}, failureUrls = new Set<string>(), hangingUrls = new Set<string>(), latencyMs = 0 } = config;

  const fetch = vi.fn(async (url: string, options: FetchOptions): Promise<string | null> => {
    if (hangingUrls.has(url)) {
      return new Promise<string | null>((resolve) => {
        options.signal?.addEventListener('abort', () => resolve(null), { once: true });
      });
    }

    if (latencyMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, latencyMs));
    }

    if (failureUrls.has(url)) {
      throw new Error(`Fetch failed for ${url}`);
    }

    const text = pages[url] ?? null;
    return text === null ? null : text.slice(0, options.maxChars);
  });

  return { fetch };
}

export type MockFetcher = ReturnType<typeof createMockFetcher>;
