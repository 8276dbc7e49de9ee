import { logger } from '../../utils/logger';
import type { MarcRecord } from '../../utils/marc';
import { BatchFetcher } from '../services/batchFetcher';
import { fetchFeedPage, readPagedFeed, rebatch } from '../services/changeFeedReader';
import {
  LOC_ADAPTER,
  LOC_FEED_HEADERS,
  LOC_OUTPUT_STEMS,
  LOC_PREOPENED_TYPES,
  feedPageUrl,
  headingTypeOf,
  parseAtomPage,
} from '../sources/loc';
import type { ItemReference } from '../types';
import { Harvester, type HarvesterContext } from './harvester';

/**
 * Harvests the id.loc.gov name and subject change feeds. Records already are
 * MARC authority records; they are sorted into one file per heading type and
 * otherwise written as received.
 */
export class LocHarvester extends Harvester {
  readonly source = 'loc' as const;

  private readonly batchFetcher: BatchFetcher<MarcRecord>;

  constructor(context: HarvesterContext) {
    super(context);
    // Records have no parents to resolve, so nothing is kept past its batch.
    this.batchFetcher = new BatchFetcher<MarcRecord>(
      this.fetcher,
      null,
      LOC_ADAPTER,
      context.config.fetch.concurrency,
      'loc',
    );
  }

  protected outputStems(): readonly string[] {
    return LOC_PREOPENED_TYPES.map((headingType) => LOC_OUTPUT_STEMS[headingType]);
  }

  protected failedItemCount(): number {
    return this.batchFetcher.summary.failed;
  }

  protected readFeed(since?: Date): AsyncIterable<ItemReference[]> {
    const { feeds, batchSize } = this.context.config.loc;
    return rebatch(this.readFeeds(feeds, since), batchSize);
  }

  private async *readFeeds(feeds: readonly string[], since?: Date): AsyncGenerator<ItemReference[]> {
    for (const feed of feeds) {
      logger.info(`Reading feed ${feed}`, { source: this.source });
      yield* readPagedFeed(
        (index) => fetchFeedPage(this.fetcher, feedPageUrl(feed, index), parseAtomPage, LOC_FEED_HEADERS),
        { since, firstPage: 1, newestFirst: true },
      );
    }
  }

  protected async processBatch(refs: ItemReference[]): Promise<void> {
    this.transition('FETCHING_BATCH');
    const resolved = await this.batchFetcher.fetchItems(refs);

    this.transition('WRITING');
    for (const { ref, item } of resolved) {
      const headingType = headingTypeOf(item);
      if (!headingType) {
        logger.warn(`Record ${ref.url} has no 100/110/111/130/150/151/155 heading; dropped`, { source: this.source });
        this.skip();
        continue;
      }
      await this.write(LOC_OUTPUT_STEMS[headingType], item);
    }
  }
}
