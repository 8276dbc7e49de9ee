import { logger } from '../../utils/logger';
import { Semaphore } from '../../utils/concurrency';
import type { FetchAdapter, ItemReference } from '../types';
import type { FetchResult, RetryingFetcher } from './retryingFetcher';
import type { ResolvedItemCache } from './resolvedItemCache';

export interface BatchFetchOutcome<TItem> {
  id: string;
  url: string;
  result: FetchResult<TItem>;
}

export interface ResolvedReference<TItem> {
  ref: ItemReference;
  item: TItem;
}

export interface BatchFetchStats {
  requested: number;
  fetched: number;
  /** Requested items that could not be fetched; prefetch misses are not counted. */
  failed: number;
  prefetched: number;
}

/**
 * Fetches detail payloads concurrently under a fixed ceiling. A failing item
 * never affects its siblings: it is logged and left out of the returned set.
 *
 * Without a cache nothing outlives the round that fetched it and no
 * parent/ancestor prefetch takes place.
 */
export class BatchFetcher<TItem> {
  private readonly semaphore: Semaphore;
  private readonly stats: BatchFetchStats = { requested: 0, fetched: 0, failed: 0, prefetched: 0 };

  constructor(
    private readonly fetcher: RetryingFetcher,
    private readonly cache: ResolvedItemCache<TItem> | null,
    private readonly adapter: FetchAdapter<TItem>,
    concurrency: number,
    private readonly source: string = 'batch',
    private readonly headers?: Record<string, string>,
  ) {
    this.semaphore = new Semaphore(concurrency);
  }

  async fetchMany(requests: Array<{ id: string; url: string }>): Promise<BatchFetchOutcome<TItem>[]> {
    const unique = Array.from(new Map(requests.map((request) => [request.id, request])).values());
    const parse = (id: string) => (body: string) => this.adapter.sanitize(this.adapter.parse(body, id));

    return Promise.all(
      unique.map(async ({ id, url }) => ({
        id,
        url,
        result: await this.semaphore.run(() => this.fetcher.fetch(url, parse(id), this.headers)),
      })),
    );
  }

  /**
   * Resolves a batch of references to payloads, in reference order. Cached
   * identifiers are not refetched. New payloads are merged into the cache
   * once the round completes, then any parent or ancestor they name that is
   * still missing is fetched in a second round.
   */
  async fetchItems(refs: readonly ItemReference[]): Promise<ResolvedReference<TItem>[]> {
    const cache = this.cache;
    if (cache === null) {
      const succeeded = new Map(await this.fetchRound(refs));
      return inReferenceOrder(refs, (id) => succeeded.get(id));
    }

    const succeeded = await this.fetchRound(refs.filter((ref) => !cache.has(ref.id)));
    cache.merge(succeeded);

    const ancestorIds = cache.missing(succeeded.flatMap(([, item]) => this.adapter.prefetchIdsOf(item)));
    if (ancestorIds.length > 0) {
      logger.debug(`Prefetching ${ancestorIds.length} parent/ancestor records`, { source: this.source });
      const prefetched = this.keepSucceeded(
        await this.fetchMany(ancestorIds.map((id) => ({ id, url: this.adapter.detailUrl(id) }))),
      );
      cache.merge(prefetched);
      this.stats.prefetched += prefetched.length;
    }

    return inReferenceOrder(refs, (id) => cache.get(id));
  }

  get summary(): BatchFetchStats {
    return { ...this.stats };
  }

  private async fetchRound(refs: readonly ItemReference[]): Promise<Array<[string, TItem]>> {
    const outcomes = await this.fetchMany(refs.map((ref) => ({ id: ref.id, url: ref.url })));
    const succeeded = this.keepSucceeded(outcomes);
    this.stats.requested += outcomes.length;
    this.stats.fetched += succeeded.length;
    this.stats.failed += outcomes.length - succeeded.length;
    return succeeded;
  }

  private keepSucceeded(outcomes: BatchFetchOutcome<TItem>[]): Array<[string, TItem]> {
    const succeeded: Array<[string, TItem]> = [];
    for (const outcome of outcomes) {
      if (outcome.result.ok) {
        succeeded.push([outcome.id, outcome.result.value]);
      } else {
        logger.warn(`Dropping ${outcome.id}: ${outcome.result.error.message}`, {
          source: this.source,
          url: outcome.url,
          kind: outcome.result.error.kind,
        });
      }
    }
    return succeeded;
  }
}

const inReferenceOrder = <TItem>(
  refs: readonly ItemReference[],
  lookup: (id: string) => TItem | undefined,
): ResolvedReference<TItem>[] => {
  const resolved: ResolvedReference<TItem>[] = [];
  for (const ref of refs) {
    const item = lookup(ref.id);
    if (item !== undefined) resolved.push({ ref, item });
  }
  return resolved;
};
