import { v4 as uuidv4 } from 'uuid';
import { describeError, logger } from '../../utils/logger';
import { MarcEncodeError, getControlField, type MarcRecord, type OutputFormat } from '../../utils/marc';
import type { HarvestConfig } from '../config';
import { RetryingFetcher, type HttpTransport } from '../services/retryingFetcher';
import type { HarvestState, HarvestSummary, ItemReference, RecordSink, SinkFactory, SourceName } from '../types';

export interface HarvesterContext {
  config: HarvestConfig;
  format: OutputFormat;
  sinkFactory: SinkFactory;
  /** Overrides the global-fetch transport. */
  transport?: HttpTransport;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

/**
 * Shared harvest loop: read the change feed page by page and push every page
 * through fetch, resolve, assemble and write before asking for the next one.
 *
 * Subclasses supply the feed and the per-batch work. The base class owns the
 * state machine, the summary, the output files and the run-scoped set of
 * identifiers already handled, so each identifier yields at most one record.
 */
export abstract class Harvester {
  abstract readonly source: SourceName;

  readonly runId = uuidv4();
  protected readonly fetcher: RetryingFetcher;
  protected readonly now: () => Date;

  private currentState: HarvestState = 'START';
  private readonly seen = new Set<string>();
  private readonly sinks = new Map<string, RecordSink>();
  private readonly stats = { batches: 0, referencesRead: 0, recordsWritten: 0, recordsSkipped: 0 };
  private error?: string;

  constructor(protected readonly context: HarvesterContext) {
    const { concurrency: _concurrency, ...retryOptions } = context.config.fetch;
    this.fetcher = new RetryingFetcher(retryOptions, {
      transport: context.transport,
      sleep: context.sleep,
      source: this.constructor.name,
    });
    this.now = context.now ?? (() => new Date());
  }

  get state(): HarvestState {
    return this.currentState;
  }

  /** Output file stems opened up front; further stems are opened on first write. */
  protected abstract outputStems(): readonly string[];

  protected abstract readFeed(since?: Date): AsyncIterable<ItemReference[]>;

  protected abstract processBatch(refs: ItemReference[], since?: Date): Promise<void>;

  /** Items requested in this run that could not be fetched. */
  protected abstract failedItemCount(): number;

  /**
   * Runs the harvest to completion. A feed-level failure moves the harvester
   * to FAILED and is rethrown; files written so far are still closed.
   */
  async start(since?: Date): Promise<HarvestSummary> {
    logger.info(
      since ? `Harvesting changes since ${since.toISOString().slice(0, 10)}` : 'Harvesting all records',
      { source: this.source, runId: this.runId },
    );

    try {
      for (const stem of this.outputStems()) {
        await this.sinkFor(stem);
      }

      this.transition('READING_FEED');
      for await (const page of this.readFeed(since)) {
        this.stats.batches += 1;
        this.stats.referencesRead += page.length;

        const fresh = this.claim(page);
        if (fresh.length > 0) {
          logger.info(`Batch ${this.stats.batches}: ${fresh.length} references`, { source: this.source });
          await this.processBatch(fresh, since);
        }
        this.transition('READING_FEED');
      }

      this.transition('DONE');
    } catch (error) {
      this.error = describeError(error);
      this.transition('FAILED');
      logger.error(`Harvest failed: ${this.error}`, { source: this.source, runId: this.runId });
      throw error;
    } finally {
      await this.closeSinks();
    }

    const summary = this.summary();
    logger.info(
      `Harvest finished: ${summary.recordsWritten} records written, ${summary.recordsSkipped} skipped, ` +
        `${summary.failedItems} failed`,
      { source: this.source, runId: this.runId },
    );
    return summary;
  }

  summary(): HarvestSummary {
    return {
      source: this.source,
      runId: this.runId,
      state: this.currentState,
      ...this.stats,
      failedItems: this.failedItemCount(),
      files: Array.from(this.sinks.values(), (sink) => sink.path),
      ...(this.error ? { error: this.error } : {}),
    };
  }

  protected transition(next: HarvestState): void {
    if (next === this.currentState) return;
    logger.debug(`${this.currentState} -> ${next}`, { source: this.source });
    this.currentState = next;
  }

  /** Writes one record; a record that cannot be encoded is logged and skipped. */
  protected async write(stem: string, record: MarcRecord): Promise<void> {
    const sink = await this.sinkFor(stem);
    try {
      await sink.write(record);
    } catch (error) {
      if (!(error instanceof MarcEncodeError)) throw error;
      logger.error(`Record ${getControlField(record, '001') ?? '(no 001)'} not written: ${error.message}`, {
        source: this.source,
        file: sink.path,
      });
      this.skip();
      return;
    }
    this.stats.recordsWritten += 1;
  }

  protected skip(count = 1): void {
    this.stats.recordsSkipped += count;
  }

  /** Drops references already handled earlier in this run (or earlier in the same page). */
  private claim(page: ItemReference[]): ItemReference[] {
    const fresh: ItemReference[] = [];
    for (const ref of page) {
      if (this.seen.has(ref.id)) {
        logger.debug(`Duplicate reference ${ref.id} ignored`, { source: this.source });
        continue;
      }
      this.seen.add(ref.id);
      fresh.push(ref);
    }
    return fresh;
  }

  private async sinkFor(stem: string): Promise<RecordSink> {
    const existing = this.sinks.get(stem);
    if (existing) return existing;
    const sink = await this.context.sinkFactory(stem, this.context.format);
    this.sinks.set(stem, sink);
    return sink;
  }

  private async closeSinks(): Promise<void> {
    for (const sink of this.sinks.values()) {
      try {
        await sink.close();
      } catch (error) {
        logger.error(`Could not close ${sink.path}: ${describeError(error)}`, { source: this.source });
      }
    }
  }
}
