import type { FetchError } from './services/retryingFetcher';

/** The change feed itself could not be read; fatal for that harvester. */
export class FeedError extends Error {
  readonly fetchError?: FetchError;

  constructor(message: string, fetchError?: FetchError) {
    super(message);
    this.name = 'FeedError';
    this.fetchError = fetchError;
  }
}

/** Invalid options or environment; the run does not start. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
