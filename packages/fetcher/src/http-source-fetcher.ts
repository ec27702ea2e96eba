/**
 * HTTP source fetcher
 */

import type { FetchOptions, SourceFetcher } from '@quarry/types';

import {
  FetchAbortedError,
  FetchError,
  FetchNetworkError,
  FetchTimeoutError,
  HttpStatusError,
} from './errors.js';
import { extractArticleText } from './extract.js';

/**
 * Configuration for the HTTP fetcher
 */
export interface HttpFetcherConfig {
  /** Timeout in milliseconds per request (default 8000) */
  timeoutMs?: number;
  /** User-Agent header sent with every request */
  userAgent?: string;
  /** Receives every failure; fetch() itself resolves to null */
  onFailure?: (failure: FetchFailure) => void;
}

/**
 * A failed fetch as seen by the failure observer
 */
export interface FetchFailure {
  url: string;
  error: FetchError;
}

export const DEFAULT_USER_AGENT = 'QuarryBot/1.0';

/**
 * Fetches pages with the global fetch API and extracts their article text
 */
export class HttpSourceFetcher implements SourceFetcher {
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly onFailure?: (failure: FetchFailure) => void;

  constructor(config: HttpFetcherConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? 8000;
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
    if (config.onFailure !== undefined) {
      this.onFailure = config.onFailure;
    }
  }

  /**
   * Fetch a page and return its extracted text, or null on any failure
   */
  async fetch(url: string, options: FetchOptions): Promise<string | null> {
    try {
      return await this.fetchText(url, options);
    } catch (error) {
      const failure = error instanceof FetchError ? error : new FetchNetworkError(url, toError(error));
      this.onFailure?.({ url, error: failure });
      return null;
    }
  }

  /**
   * Fetch a page and return its extracted text
   *
   * @throws FetchError subclasses describing the failure
   */
  async fetchText(url: string, options: FetchOptions): Promise<string> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    let html: string;
    try {
      const response = await fetch(url, {
        headers: { 'User-Agent': this.userAgent, Accept: 'text/html' },
        redirect: 'follow',
        signal,
      });
      if (!response.ok) {
        throw new HttpStatusError(url, response.status);
      }
      html = await response.text();
    } catch (error) {
      if (error instanceof FetchError) throw error;
      if (options.signal?.aborted) throw new FetchAbortedError(url);
      if (timeout.aborted) throw new FetchTimeoutError(url, this.timeoutMs);
      throw new FetchNetworkError(url, toError(error));
    }

    return extractArticleText(html, options.maxChars);
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
