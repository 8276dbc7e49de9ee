import { logger, describeError } from '../../utils/logger';
import { sleep as defaultSleep } from '../../utils/concurrency';
import type { FetchSettings } from '../config';

export type FetchErrorKind = 'server' | 'connection' | 'timeout' | 'client' | 'malformed';

export interface FetchError {
  kind: FetchErrorKind;
  url: string;
  message: string;
  status?: number;
  attempts: number;
}

export type FetchResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: FetchError };

export interface TransportRequest {
  timeoutMs: number;
  headers?: Record<string, string>;
}

export interface TransportResponse {
  status: number;
  ok: boolean;
  text(): Promise<string>;
}

export type HttpTransport = (url: string, request: TransportRequest) => Promise<TransportResponse>;

export type RetryOptions = Pick<
  FetchSettings,
  'maxRetries' | 'retryBackoffMs' | 'timeoutMs' | 'timeoutStepMs' | 'maxTimeoutMs'
>;

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 5,
  retryBackoffMs: 1000,
  timeoutMs: 60_000,
  timeoutStepMs: 60_000,
  maxTimeoutMs: 300_000,
};

const BODY_SNIPPET_LENGTH = 200;

const isAbortLikeError = (error: unknown): boolean => {
  if (!(error instanceof Error)) return false;
  const message = error.message.toLowerCase();
  return error.name === 'AbortError' || error.name === 'TimeoutError' || message.includes('aborted');
};

/**
 * Default transport: Node's global fetch with an AbortController deadline
 * covering both the response headers and the body.
 */
export const fetchTransport: HttpTransport = async (url, { timeoutMs, headers }) => {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { headers, signal: controller.signal });
    const body = await response.text();
    return { status: response.status, ok: response.ok, text: async () => body };
  } finally {
    clearTimeout(timeoutId);
  }
};

export const isRetryable = (kind: FetchErrorKind): boolean => {
  switch (kind) {
    case 'server':
    case 'connection':
    case 'timeout':
      return true;
    case 'client':
    case 'malformed':
      return false;
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
};

export interface RetryingFetcherDeps {
  transport?: HttpTransport;
  sleep?: (ms: number) => Promise<void>;
  source?: string;
}

export class RetryingFetcher {
  private readonly options: RetryOptions;
  private readonly transport: HttpTransport;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly source: string;

  constructor(options: Partial<RetryOptions> = {}, deps: RetryingFetcherDeps = {}) {
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...options };
    this.transport = deps.transport ?? fetchTransport;
    this.sleep = deps.sleep ?? defaultSleep;
    this.source = deps.source ?? 'http';
  }

  /**
   * Issues the request until it succeeds, fails with a non-retryable kind, or
   * the retry budget is spent. Attempts never overlap.
   */
  async fetch<T>(
    url: string,
    parse: (body: string) => T,
    headers?: Record<string, string>,
  ): Promise<FetchResult<T>> {
    let timeoutMs = this.options.timeoutMs;

    for (let attempt = 1; ; attempt += 1) {
      const outcome = await this.attempt(url, parse, timeoutMs, attempt, headers);
      if (outcome.ok) return outcome;

      const { error } = outcome;
      if (!isRetryable(error.kind)) {
        logger.error(`Request failed (${error.kind}), not retrying: ${error.message}`, {
          source: this.source,
          url,
          status: error.status,
        });
        return outcome;
      }

      if (attempt > this.options.maxRetries) {
        logger.error(`Request failed after ${attempt} attempts (${error.kind}): ${error.message}`, {
          source: this.source,
          url,
          status: error.status,
        });
        return outcome;
      }

      if (error.kind === 'timeout') {
        timeoutMs = Math.min(timeoutMs + this.options.timeoutStepMs, this.options.maxTimeoutMs);
      }

      const waitMs = this.options.retryBackoffMs * attempt;
      logger.warn(`Request failed (${error.kind}), retry ${attempt}/${this.options.maxRetries} in ${waitMs}ms`, {
        source: this.source,
        url,
        timeoutMs,
      });
      await this.sleep(waitMs);
    }
  }

  private async attempt<T>(
    url: string,
    parse: (body: string) => T,
    timeoutMs: number,
    attempts: number,
    headers?: Record<string, string>,
  ): Promise<FetchResult<T>> {
    const fail = (kind: FetchErrorKind, message: string, status?: number): FetchResult<T> => ({
      ok: false,
      error: { kind, url, message, status, attempts },
    });

    logger.debug(`GET ${url}`, { source: this.source, attempt: attempts, timeoutMs });

    let response: TransportResponse;
    try {
      response = await this.transport(url, { timeoutMs, headers });
    } catch (error) {
      return isAbortLikeError(error)
        ? fail('timeout', `No response within ${timeoutMs}ms`)
        : fail('connection', describeError(error));
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      return isAbortLikeError(error)
        ? fail('timeout', `Body not received within ${timeoutMs}ms`)
        : fail('connection', describeError(error));
    }

    if (response.status >= 500) {
      return fail('server', `HTTP ${response.status}: ${body.slice(0, BODY_SNIPPET_LENGTH)}`, response.status);
    }
    if (!response.ok) {
      return fail('client', `HTTP ${response.status}: ${body.slice(0, BODY_SNIPPET_LENGTH)}`, response.status);
    }

    try {
      return { ok: true, value: parse(body), attempts };
    } catch (error) {
      return fail('malformed', `Could not decode response: ${describeError(error)}`, response.status);
    }
  }
}
