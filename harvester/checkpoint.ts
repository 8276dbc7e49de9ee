import { constants } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { describeError } from '../utils/logger';
import { ConfigurationError } from './errors';

export const DEFAULT_CHECKPOINT_FILE = path.join('output', 'last_run_date.log');

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export const formatIsoDate = (date: Date): string => date.toISOString().slice(0, 10);

/** Midnight UTC of the given instant's calendar day. */
export const startOfUtcDay = (date: Date): Date =>
  new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));

/** Strict `YYYY-MM-DD` parse; rejects calendar overflow such as `2024-02-30`. */
export const parseIsoDate = (value: string): Date | undefined => {
  const trimmed = value.trim();
  if (!ISO_DATE.test(trimmed)) return undefined;
  const parsed = new Date(`${trimmed}T00:00:00Z`);
  if (Number.isNaN(parsed.getTime()) || formatIsoDate(parsed) !== trimmed) return undefined;
  return parsed;
};

export const readCheckpoint = async (file: string): Promise<Date> => {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read checkpoint ${file}: ${describeError(error)}`);
  }

  const line = content.split(/\r?\n/).find((entry) => entry.trim().length > 0) ?? '';
  const date = parseIsoDate(line);
  if (!date) {
    throw new ConfigurationError(`Checkpoint ${file} does not hold a YYYY-MM-DD date: "${line.trim()}"`);
  }
  return date;
};

/** Records the day a run completed; the next `--continue` run starts from it. */
export const writeCheckpoint = async (file: string, date: Date): Promise<void> => {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, `${formatIsoDate(date)}\n`, 'utf-8');
};

export interface HarvestWindowOptions {
  continue?: boolean;
  date?: string;
  offset?: string;
  all?: boolean;
}

/**
 * Turns the mutually exclusive start options into the lower bound of the
 * harvest window. `undefined` means a full harvest.
 */
export const resolveSince = async (
  options: HarvestWindowOptions,
  checkpointFile: string,
  today: Date,
): Promise<Date | undefined> => {
  const chosen = [options.continue, options.date !== undefined, options.offset !== undefined, options.all].filter(
    Boolean,
  ).length;
  if (chosen !== 1) {
    throw new ConfigurationError('Exactly one of --continue, --date, --offset or --all is required');
  }

  if (options.all) return undefined;

  if (options.continue) return readCheckpoint(checkpointFile);

  if (options.date !== undefined) {
    const date = parseIsoDate(options.date);
    if (!date) {
      throw new ConfigurationError(`Invalid date "${options.date}", expected YYYY-MM-DD`);
    }
    return date;
  }

  const days = Number(options.offset);
  if (!Number.isInteger(days) || days <= 0) {
    throw new ConfigurationError(`Invalid offset "${options.offset}", expected a positive number of days`);
  }
  return new Date(startOfUtcDay(today).getTime() - days * DAY_MS);
};

/** Creates the directory if needed and checks that it can be written to. */
export const ensureWritableDirectory = async (directory: string): Promise<string> => {
  const resolved = path.resolve(directory);
  try {
    await fs.mkdir(resolved, { recursive: true });
    await fs.access(resolved, constants.W_OK);
  } catch (error) {
    throw new ConfigurationError(`Output directory ${resolved} is not writable: ${describeError(error)}`);
  }
  return resolved;
};
