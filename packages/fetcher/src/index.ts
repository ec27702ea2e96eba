/**
 * @quarry/fetcher - HTTP source fetcher
 */

export {
  HttpSourceFetcher,
  DEFAULT_USER_AGENT,
  type HttpFetcherConfig,
  type FetchFailure,
} from './http-source-fetcher.js';
export { extractArticleText, normalizeWhitespace } from './extract.js';
export {
  FetchError,
  HttpStatusError,
  FetchTimeoutError,
  FetchAbortedError,
  FetchNetworkError,
} from './errors.js';
