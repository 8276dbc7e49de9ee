import { fetchFeedPage, readOffsetFeed, readScrollFeed } from '../services/changeFeedReader';
import { GAZETTEER_MAPPING } from '../services/marcMapping';
import {
  GAZETTEER_OUTPUT_STEM,
  buildChangeQuery,
  buildOffsetSearchUrl,
  buildScrollContinueUrl,
  buildScrollSearchUrl,
  createGazetteerAdapter,
  parseSearchPage,
  type GazetteerPlace,
} from '../sources/gazetteer';
import type { ItemReference } from '../types';
import type { HarvesterContext } from './harvester';
import { HierarchicalHarvester } from './hierarchicalHarvester';

export class GazetteerHarvester extends HierarchicalHarvester<GazetteerPlace> {
  readonly source = 'gazetteer' as const;

  constructor(context: HarvesterContext) {
    super(context, createGazetteerAdapter(context.config.gazetteer), GAZETTEER_MAPPING, GAZETTEER_OUTPUT_STEM);
  }

  protected readFeed(since?: Date): AsyncIterable<ItemReference[]> {
    const { baseUrl, batchSize, feedMode } = this.context.config.gazetteer;
    const query = buildChangeQuery(since, this.now());
    const parse = (body: string) => parseSearchPage(body, this.adapter);

    if (feedMode === 'scroll') {
      return readScrollFeed(
        () => fetchFeedPage(this.fetcher, buildScrollSearchUrl(baseUrl, query, batchSize), parse),
        (cursor) => fetchFeedPage(this.fetcher, buildScrollContinueUrl(baseUrl, cursor), parse),
      );
    }

    return readOffsetFeed(
      (offset, limit) => fetchFeedPage(this.fetcher, buildOffsetSearchUrl(baseUrl, query, offset, limit), parse),
      batchSize,
    );
  }
}
