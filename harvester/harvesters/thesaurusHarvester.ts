import { logger } from '../../utils/logger';
import { isChangedSince, walkTree } from '../services/changeFeedReader';
import { THESAURUS_MAPPING } from '../services/marcMapping';
import {
  THESAURUS_OUTPUT_STEM,
  createThesaurusAdapter,
  toConceptUri,
  type ThesaurusConcept,
} from '../sources/thesaurus';
import type { ItemReference } from '../types';
import type { HarvesterContext } from './harvester';
import { HierarchicalHarvester } from './hierarchicalHarvester';

export class ThesaurusHarvester extends HierarchicalHarvester<ThesaurusConcept> {
  readonly source = 'thesaurus' as const;

  constructor(context: HarvesterContext) {
    super(context, createThesaurusAdapter(context.config.thesaurus), THESAURUS_MAPPING, THESAURUS_OUTPUT_STEM);
  }

  /**
   * The thesaurus has no change feed: the whole tree is walked and the
   * modification dates of each concept decide whether it is written.
   */
  protected readFeed(): AsyncIterable<ItemReference[]> {
    const { baseUrl, rootIds, batchSize } = this.context.config.thesaurus;
    return walkTree(this.batchFetcher, {
      rootIds: rootIds.map((id) => toConceptUri(baseUrl, id)),
      detailUrl: (id) => this.adapter.detailUrl(id),
      childrenOf: (concept) => concept.narrower,
      batchSize,
    });
  }

  protected shouldEmit(concept: ThesaurusConcept, since?: Date): boolean {
    if (this.adapter.isTopConcept(concept)) {
      logger.info(`Skipping root concept ${concept.uri}`, { source: this.source });
      return false;
    }
    return isChangedSince(concept, since);
  }
}
