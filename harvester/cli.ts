import { Command } from 'commander';
import path from 'path';
import { describeError, logger } from '../utils/logger';
import { OUTPUT_FORMATS, type OutputFormat } from '../utils/marc';
import {
  DEFAULT_CHECKPOINT_FILE,
  ensureWritableDirectory,
  formatIsoDate,
  resolveSince,
  writeCheckpoint,
} from './checkpoint';
import { loadHarvestConfig } from './config';
import { ConfigurationError } from './errors';
import { runHarvest, type RunOptions } from './runner';
import { SOURCE_NAMES, type SourceName } from './types';

export type CliOptions = {
  format: string;
  sources: string;
  target?: string;
  checkpoint: string;
  continue?: boolean;
  date?: string;
  offset?: string;
  all?: boolean;
};

export interface CliDependencies {
  env?: Record<string, string | undefined>;
  now?: () => Date;
  transport?: RunOptions['transport'];
  sleep?: RunOptions['sleep'];
  sinkFactory?: RunOptions['sinkFactory'];
}

export const createProgram = (): Command =>
  new Command()
    .name('authority-harvester')
    .description('Harvest authority records from the iDAI gazetteer, id.loc.gov and the iDAI thesaurus')
    .option('-f, --format <format>', `output format (${OUTPUT_FORMATS.join('|')})`, 'marc')
    .option('-s, --sources <sources>', `sources to harvest: all or a comma list of ${SOURCE_NAMES.join(', ')}`, 'all')
    .option('-t, --target <directory>', 'output directory (default ./output/<today>/)')
    .option('--checkpoint <file>', 'file holding the date of the last complete run', DEFAULT_CHECKPOINT_FILE)
    .option('-c, --continue', 'harvest changes since the date in the checkpoint file')
    .option('-d, --date <YYYY-MM-DD>', 'harvest changes since the given date')
    .option('-o, --offset <days>', 'harvest changes of the last <days> days')
    .option('-a, --all', 'harvest everything')
    .showHelpAfterError();

const isOutputFormat = (value: string): value is OutputFormat => OUTPUT_FORMATS.some((format) => format === value);

const isSourceName = (value: string): value is SourceName => SOURCE_NAMES.some((source) => source === value);

export const parseFormat = (value: string): OutputFormat => {
  const format = value.trim().toLowerCase();
  if (!isOutputFormat(format)) {
    throw new ConfigurationError(`Unknown output format "${value}", expected one of ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
};

export const parseSources = (value: string): SourceName[] => {
  const entries = value
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter(Boolean);
  if (entries.length === 0 || entries.includes('all')) return [...SOURCE_NAMES];

  const unknown = entries.filter((entry) => !isSourceName(entry));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown source(s): ${unknown.join(', ')}`);
  }
  return SOURCE_NAMES.filter((source) => entries.includes(source));
};

/**
 * Parses the command line, runs the selected harvesters and updates the
 * checkpoint. Resolves to the process exit code.
 */
export const runCli = async (argv: readonly string[], deps: CliDependencies = {}): Promise<number> => {
  const program = createProgram();
  program.parse([...argv], { from: 'user' });
  const options = program.opts<CliOptions>();
  const now = deps.now ?? (() => new Date());
  const today = now();

  let runOptions: RunOptions;
  try {
    const format = parseFormat(options.format);
    const sources = parseSources(options.sources);
    const since = await resolveSince(options, options.checkpoint, today);
    const targetDirectory = await ensureWritableDirectory(
      options.target ?? path.join('output', formatIsoDate(today)),
    );
    runOptions = {
      sources,
      since,
      format,
      targetDirectory,
      config: loadHarvestConfig(deps.env ?? process.env),
      transport: deps.transport,
      sleep: deps.sleep,
      sinkFactory: deps.sinkFactory,
      now,
    };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message, { source: 'cli' });
      return 2;
    }
    throw error;
  }

  logger.info(
    `Harvesting ${runOptions.sources.join(', ')} as ${runOptions.format} into ${runOptions.targetDirectory}`,
    { source: 'cli', since: runOptions.since ? formatIsoDate(runOptions.since) : 'all' },
  );

  const report = await runHarvest(runOptions);
  for (const summary of report.summaries) {
    logger.info(
      `${summary.source}: ${summary.state}, ${summary.recordsWritten} written, ${summary.recordsSkipped} skipped, ` +
        `${summary.failedItems} failed`,
      { source: 'cli', runId: summary.runId, files: summary.files },
    );
  }

  if (!report.completed) {
    const failed = report.summaries.filter((summary) => summary.state !== 'DONE').map((summary) => summary.source);
    logger.error(`Harvest incomplete (${failed.join(', ')}); checkpoint left unchanged`, { source: 'cli' });
    return 1;
  }

  const completedAt = now();
  try {
    await writeCheckpoint(options.checkpoint, completedAt);
  } catch (error) {
    logger.error(`Could not write checkpoint ${options.checkpoint}: ${describeError(error)}`, { source: 'cli' });
    return 1;
  }
  logger.info(`Checkpoint ${options.checkpoint} set to ${formatIsoDate(completedAt)}`, { source: 'cli' });
  return 0;
};
