import { logger } from '../../utils/logger';
import type { AncestorChain, AncestorEntry, ChainStop, ItemAdapter } from '../types';
import type { ResolvedItemCache } from './resolvedItemCache';
import type { RetryingFetcher } from './retryingFetcher';

/**
 * Walks an item's parent pointers up to the top of its hierarchy.
 *
 * The walk ends when there is no further parent, at an access-denied node,
 * at the absolute-root marker, when an ancestor cannot be fetched, or when a
 * parent pointer leads back to a node already on the path. An ancestor
 * without a preferred label is passed through without an entry; `order`
 * counts emitted entries only, so orders always run 1..n.
 */
export class AncestorResolver<TItem> {
  constructor(
    private readonly fetcher: RetryingFetcher,
    private readonly cache: ResolvedItemCache<TItem>,
    private readonly adapter: ItemAdapter<TItem>,
    private readonly source: string = 'resolver',
    private readonly headers?: Record<string, string>,
  ) {}

  async resolveChain(item: TItem): Promise<AncestorChain<TItem>> {
    const entries: AncestorEntry<TItem>[] = [];
    const startId = this.adapter.idOf(item);
    const path = new Set<string>([startId]);

    const finish = (stop: ChainStop): AncestorChain<TItem> => ({ entries, stop });

    let parentId = this.adapter.parentOf(item);
    while (parentId !== undefined) {
      if (path.has(parentId)) {
        logger.error(`Cyclic ancestry: ${parentId} is already an ancestor of ${startId}`, {
          source: this.source,
          path: [...path, parentId],
        });
        return finish('cycle');
      }
      path.add(parentId);

      const ancestor = await this.load(parentId, startId);
      if (ancestor === undefined) {
        logger.warn(`Ancestor ${parentId} of ${startId} could not be resolved; chain truncated`, {
          source: this.source,
        });
        return finish('unresolvable');
      }

      if (this.adapter.isAccessDenied(ancestor)) {
        logger.debug(`Ancestor ${parentId} is access-denied; chain ends`, { source: this.source });
        return finish('access-denied');
      }

      if (this.adapter.isTopConcept(ancestor)) {
        return finish('top-concept');
      }

      const heading = this.adapter.ancestorHeadingOf
        ? this.adapter.ancestorHeadingOf(ancestor)
        : this.adapter.preferredHeadingOf(ancestor);
      if (heading) {
        entries.push({ id: parentId, item: ancestor, heading, order: entries.length + 1 });
      } else {
        logger.warn(`No preferred label for ancestor ${this.adapter.detailUrl(parentId)}; level skipped`, {
          source: this.source,
          child: startId,
        });
      }

      parentId = this.adapter.parentOf(ancestor);
    }

    return finish('root');
  }

  private async load(id: string, childId: string): Promise<TItem | undefined> {
    const cached = this.cache.get(id);
    if (cached !== undefined) return cached;

    const url = this.adapter.detailUrl(id);
    logger.debug(`Parent ${url} not cached (child ${childId}), fetching`, { source: this.source });

    const result = await this.fetcher.fetch(
      url,
      (body) => this.adapter.sanitize(this.adapter.parse(body, id)),
      this.headers,
    );
    if (!result.ok) return undefined;

    this.cache.set(id, result.value);
    return this.cache.get(id);
  }
}
