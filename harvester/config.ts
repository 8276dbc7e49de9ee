export type GazetteerFeedMode = 'offset' | 'scroll';

export interface FetchSettings {
  concurrency: number;
  maxRetries: number;
  retryBackoffMs: number;
  timeoutMs: number;
  timeoutStepMs: number;
  maxTimeoutMs: number;
}

export interface GazetteerSettings {
  baseUrl: string;
  batchSize: number;
  feedMode: GazetteerFeedMode;
}

export interface LocSettings {
  feeds: string[];
  batchSize: number;
}

export interface ThesaurusSettings {
  baseUrl: string;
  rootIds: string[];
  preferredLanguage: string;
  batchSize: number;
}

export interface HarvestConfig {
  fetch: FetchSettings;
  gazetteer: GazetteerSettings;
  loc: LocSettings;
  thesaurus: ThesaurusSettings;
}

type Env = Record<string, string | undefined>;

const parseIntegerEnv = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseListEnv = (value: string | undefined, fallback: string[]): string[] => {
  if (!value) return fallback;
  const entries = value
    .split(/[,;|]/g)
    .map((entry) => entry.trim())
    .filter(Boolean);
  return entries.length > 0 ? entries : fallback;
};

const parseUrlEnv = (value: string | undefined, fallback: string): string => {
  const trimmed = (value || '').trim() || fallback;
  return trimmed.endsWith('/') ? trimmed : `${trimmed}/`;
};

const normalizeFeedMode = (value: string | undefined): GazetteerFeedMode => {
  const mode = (value || '').trim().toLowerCase();
  return mode === 'scroll' ? 'scroll' : 'offset';
};

export const DEFAULT_GAZETTEER_URL = 'https://gazetteer.dainst.org/';
export const DEFAULT_THESAURUS_URL = 'http://thesauri.dainst.org/';
export const DEFAULT_THESAURUS_ROOT = '_fe65f286';
export const DEFAULT_LOC_FEEDS = [
  'https://id.loc.gov/authorities/names/feed/',
  'https://id.loc.gov/authorities/subjects/feed/',
];

/**
 * Reads harvest settings from the environment. Every value has a default,
 * so an empty environment yields a working configuration.
 */
export const loadHarvestConfig = (env: Env = process.env): HarvestConfig => {
  const timeoutMs = Math.max(1000, parseIntegerEnv(env.HARVEST_TIMEOUT_MS, 60_000));

  return {
    fetch: {
      concurrency: Math.max(1, parseIntegerEnv(env.HARVEST_CONCURRENCY, 8)),
      maxRetries: Math.max(0, parseIntegerEnv(env.HARVEST_MAX_RETRIES, 5)),
      retryBackoffMs: Math.max(0, parseIntegerEnv(env.HARVEST_RETRY_BACKOFF_MS, 1000)),
      timeoutMs,
      timeoutStepMs: Math.max(0, parseIntegerEnv(env.HARVEST_TIMEOUT_STEP_MS, 60_000)),
      maxTimeoutMs: Math.max(timeoutMs, parseIntegerEnv(env.HARVEST_TIMEOUT_MAX_MS, 300_000)),
    },
    gazetteer: {
      baseUrl: parseUrlEnv(env.GAZETTEER_BASE_URL, DEFAULT_GAZETTEER_URL),
      batchSize: Math.max(1, parseIntegerEnv(env.GAZETTEER_BATCH_SIZE, 250)),
      feedMode: normalizeFeedMode(env.GAZETTEER_FEED_MODE),
    },
    loc: {
      feeds: parseListEnv(env.LOC_FEEDS, DEFAULT_LOC_FEEDS).map((feed) => parseUrlEnv(feed, feed)),
      batchSize: Math.max(1, parseIntegerEnv(env.LOC_BATCH_SIZE, 300)),
    },
    thesaurus: {
      baseUrl: parseUrlEnv(env.THESAURUS_BASE_URL, DEFAULT_THESAURUS_URL),
      rootIds: parseListEnv(env.THESAURUS_ROOT_IDS, [DEFAULT_THESAURUS_ROOT]),
      preferredLanguage: (env.THESAURUS_PREFERRED_LANGUAGE || 'de').trim().toLowerCase() || 'de',
      batchSize: Math.max(1, parseIntegerEnv(env.THESAURUS_BATCH_SIZE, 100)),
    },
  };
};
