import { logger } from '../../utils/logger';
import { FeedError } from '../errors';
import type { ItemReference } from '../types';
import type { BatchFetcher } from './batchFetcher';
import type { RetryingFetcher } from './retryingFetcher';

const ZONE_DESIGNATOR = /(Z|[+-]\d{2}:?\d{2})$/i;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parses an ISO-8601 timestamp to epoch milliseconds. A timestamp without a
 * zone designator is read as UTC.
 */
export const parseTimestamp = (value: string): number | undefined => {
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  const normalized = DATE_ONLY.test(trimmed) || ZONE_DESIGNATOR.test(trimmed) ? trimmed : `${trimmed}Z`;
  const parsed = Date.parse(normalized);
  return Number.isNaN(parsed) ? undefined : parsed;
};

export interface ChangeTimestamps {
  modified?: readonly string[];
  created?: readonly string[];
}

const latest = (values: readonly string[] | undefined): number | undefined => {
  const parsed = (values ?? [])
    .map(parseTimestamp)
    .filter((value): value is number => value !== undefined);
  return parsed.length > 0 ? Math.max(...parsed) : undefined;
};

/**
 * Inclusive lower bound on the latest modification (or, lacking one, the
 * latest creation). Without `since` everything passes; with it, an item
 * carrying no usable timestamp does not.
 */
export const isChangedSince = (timestamps: ChangeTimestamps, since?: Date): boolean => {
  if (!since) return true;
  const changedAt = latest(timestamps.modified) ?? latest(timestamps.created);
  if (changedAt === undefined) return false;
  return changedAt >= since.getTime();
};

/** Fetches one feed page; any failure is fatal for the feed. */
export const fetchFeedPage = async <T>(
  fetcher: RetryingFetcher,
  url: string,
  parse: (body: string) => T,
  headers?: Record<string, string>,
): Promise<T> => {
  const result = await fetcher.fetch(url, parse, headers);
  if (!result.ok) {
    throw new FeedError(`Could not read feed page ${url}: ${result.error.message}`, result.error);
  }
  return result.value;
};

export interface OffsetPage {
  items: ItemReference[];
  total?: number;
}

/**
 * Offset/limit pagination. Stops on a short page or once the reported total
 * has been reached.
 */
export async function* readOffsetFeed(
  fetchPage: (offset: number, limit: number) => Promise<OffsetPage>,
  pageSize: number,
): AsyncGenerator<ItemReference[]> {
  let offset = 0;
  for (;;) {
    const page = await fetchPage(offset, pageSize);
    if (offset === 0 && page.total !== undefined) {
      logger.info(`${page.total} items in feed, ${Math.ceil(page.total / pageSize)} batches`);
    }
    if (page.items.length > 0) yield page.items;

    offset += pageSize;
    if (page.items.length < pageSize) return;
    if (page.total !== undefined && offset >= page.total) return;
  }
}

export interface ScrollPage {
  items: ItemReference[];
  cursor?: string;
  total?: number;
}

/**
 * Scroll-cursor pagination. The first page hands out the cursor; every later
 * request reuses it until a page comes back empty.
 */
export async function* readScrollFeed(
  openScroll: () => Promise<ScrollPage>,
  continueScroll: (cursor: string) => Promise<ScrollPage>,
): AsyncGenerator<ItemReference[]> {
  const first = await openScroll();
  if (first.total !== undefined) {
    logger.info(`${first.total} items in scroll`);
  }
  if (first.items.length === 0) return;
  yield first.items;

  const cursor = first.cursor;
  if (!cursor) {
    throw new FeedError('Scroll response did not include a cursor');
  }

  for (;;) {
    const page = await continueScroll(cursor);
    if (page.items.length === 0) return;
    yield page.items;
  }
}

export interface PagedFeedOptions {
  since?: Date;
  firstPage?: number;
  /** Entries are ordered newest first, so a page entirely before `since` ends the walk. */
  newestFirst?: boolean;
}

/**
 * Page-index feeds (`feed/1`, `feed/2`, ...). Entries are filtered by their
 * `changedAt` against `since`; an empty page ends the feed.
 */
export async function* readPagedFeed(
  fetchPage: (index: number) => Promise<ItemReference[]>,
  options: PagedFeedOptions = {},
): AsyncGenerator<ItemReference[]> {
  const { since, newestFirst = false } = options;
  for (let index = options.firstPage ?? 1; ; index += 1) {
    const entries = await fetchPage(index);
    if (entries.length === 0) return;

    const within = entries.filter((entry) =>
      isChangedSince({ modified: entry.changedAt ? [entry.changedAt] : [] }, since),
    );
    if (within.length > 0) yield within;

    if (since && newestFirst && within.length === 0) {
      logger.debug(`Page ${index} lies entirely before ${since.toISOString()}, ending feed`);
      return;
    }
  }
}

export interface TreeWalkOptions<TItem> {
  rootIds: readonly string[];
  detailUrl: (id: string) => string;
  childrenOf: (item: TItem) => string[];
  batchSize: number;
}

/**
 * Breadth-first walk over "narrower" links with an explicit work list. Nodes
 * are fetched in concurrent batches and land in the run cache, so the
 * references yielded here are already resolved. A node reachable again,
 * through a cycle or a second parent, is walked once.
 */
export async function* walkTree<TItem>(
  batchFetcher: BatchFetcher<TItem>,
  options: TreeWalkOptions<TItem>,
): AsyncGenerator<ItemReference[]> {
  const visited = new Set<string>(options.rootIds);
  const queue: string[] = [...options.rootIds];
  const roots = new Set(options.rootIds);

  while (queue.length > 0) {
    const refs = queue.splice(0, options.batchSize).map((id) => ({ id, url: options.detailUrl(id) }));
    const resolved = await batchFetcher.fetchItems(refs);
    const fetchedIds = new Set(resolved.map(({ ref }) => ref.id));

    const missingRoot = refs.find((ref) => roots.has(ref.id) && !fetchedIds.has(ref.id));
    if (missingRoot) {
      throw new FeedError(`Could not fetch root node ${missingRoot.url}`);
    }

    for (const { ref, item } of resolved) {
      for (const childId of options.childrenOf(item)) {
        if (visited.has(childId)) {
          logger.debug(`Node ${childId} already visited (reached again from ${ref.id})`);
          continue;
        }
        visited.add(childId);
        queue.push(childId);
      }
    }

    if (resolved.length > 0) yield resolved.map(({ ref }) => ref);
  }
}

/**
 * Regroups feed pages into batches of at least `size` references (the last
 * batch may be smaller). Used where feed pages are small and detail fetches
 * should run in larger concurrent rounds.
 */
export async function* rebatch(
  pages: AsyncIterable<ItemReference[]>,
  size: number,
): AsyncGenerator<ItemReference[]> {
  let pending: ItemReference[] = [];
  for await (const page of pages) {
    pending.push(...page);
    if (pending.length >= size) {
      yield pending;
      pending = [];
    }
  }
  if (pending.length > 0) yield pending;
}
