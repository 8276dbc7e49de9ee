import { logger } from '../../utils/logger';
import { AncestorResolver } from '../services/ancestorResolver';
import { BatchFetcher } from '../services/batchFetcher';
import { toMarcRecord, type MarcMappingProfile } from '../services/marcMapping';
import { assembleRecord } from '../services/recordAssembler';
import { ResolvedItemCache } from '../services/resolvedItemCache';
import type { AncestorChain, AuthorityRecord, ItemAdapter, ItemReference } from '../types';
import { Harvester, type HarvesterContext } from './harvester';

/**
 * Harvester for sources whose items point at a parent: every item is written
 * with its resolved ancestor chain as broader references.
 */
export abstract class HierarchicalHarvester<TItem> extends Harvester {
  protected readonly cache = new ResolvedItemCache<TItem>();
  protected readonly batchFetcher: BatchFetcher<TItem>;
  protected readonly resolver: AncestorResolver<TItem>;

  constructor(
    context: HarvesterContext,
    protected readonly adapter: ItemAdapter<TItem>,
    private readonly mapping: MarcMappingProfile,
    private readonly outputStem: string,
  ) {
    super(context);
    const source = adapter.constants.sourceCode;
    this.batchFetcher = new BatchFetcher(this.fetcher, this.cache, adapter, context.config.fetch.concurrency, source);
    this.resolver = new AncestorResolver(this.fetcher, this.cache, adapter, source);
  }

  protected outputStems(): readonly string[] {
    return [this.outputStem];
  }

  protected failedItemCount(): number {
    return this.batchFetcher.summary.failed;
  }

  /** Whether a fetched item becomes a record at all. */
  protected shouldEmit(_item: TItem, _since?: Date): boolean {
    return true;
  }

  protected async processBatch(refs: ItemReference[], since?: Date): Promise<void> {
    this.transition('FETCHING_BATCH');
    const resolved = await this.batchFetcher.fetchItems(refs);
    const items = resolved.map(({ item }) => item).filter((item) => this.shouldEmit(item, since));
    this.skip(resolved.length - items.length);

    // Chains are resolved one item at a time so the cache has a single writer.
    this.transition('RESOLVING');
    const chains: Array<[TItem, AncestorChain<TItem>]> = [];
    for (const item of items) {
      chains.push([item, await this.resolver.resolveChain(item)]);
    }

    this.transition('ASSEMBLING');
    const records: AuthorityRecord[] = [];
    for (const [item, chain] of chains) {
      const record = assembleRecord(item, chain, this.adapter);
      if (record) {
        records.push(record);
      } else {
        this.skip();
      }
    }

    this.transition('WRITING');
    const createdOn = this.now();
    for (const record of records) {
      await this.write(this.outputStem, toMarcRecord(record, this.mapping, createdOn));
    }
    logger.debug(`Wrote ${records.length} of ${refs.length} records`, { source: this.source });
  }
}
