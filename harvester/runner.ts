import { describeError, logger } from '../utils/logger';
import type { OutputFormat } from '../utils/marc';
import type { HarvestConfig } from './config';
import { GazetteerHarvester } from './harvesters/gazetteerHarvester';
import type { Harvester, HarvesterContext } from './harvesters/harvester';
import { LocHarvester } from './harvesters/locHarvester';
import { ThesaurusHarvester } from './harvesters/thesaurusHarvester';
import type { HttpTransport } from './services/retryingFetcher';
import { fileSinkFactory } from './services/recordSink';
import type { HarvestSummary, SinkFactory, SourceName } from './types';

export const HARVESTERS: Record<SourceName, (context: HarvesterContext) => Harvester> = {
  gazetteer: (context) => new GazetteerHarvester(context),
  loc: (context) => new LocHarvester(context),
  thesaurus: (context) => new ThesaurusHarvester(context),
};

export interface RunOptions {
  sources: readonly SourceName[];
  since?: Date;
  format: OutputFormat;
  targetDirectory: string;
  config: HarvestConfig;
  sinkFactory?: SinkFactory;
  transport?: HttpTransport;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface RunReport {
  summaries: HarvestSummary[];
  /** True when every selected harvester reached DONE. */
  completed: boolean;
}

/**
 * Runs the selected harvesters one after the other. A harvester that fails
 * is reported and the next one still runs.
 */
export const runHarvest = async (options: RunOptions): Promise<RunReport> => {
  const context: HarvesterContext = {
    config: options.config,
    format: options.format,
    sinkFactory: options.sinkFactory ?? fileSinkFactory(options.targetDirectory),
    transport: options.transport,
    sleep: options.sleep,
    now: options.now,
  };

  const summaries: HarvestSummary[] = [];
  for (const source of options.sources) {
    const harvester = HARVESTERS[source](context);
    try {
      summaries.push(await harvester.start(options.since));
    } catch (error) {
      logger.error(`${source} harvester aborted: ${describeError(error)}`, { source });
      summaries.push(harvester.summary());
    }
  }

  return { summaries, completed: summaries.every((summary) => summary.state === 'DONE') };
};
