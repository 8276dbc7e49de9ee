import winston from 'winston';

const LEVEL_KEY = 'LOG_LEVEL';
const FORMAT_KEY = 'LOG_FORMAT';

const resolveLevel = (): string => {
  const configured = (process.env[LEVEL_KEY] || '').trim().toLowerCase();
  if (configured && configured in winston.config.npm.levels) {
    return configured;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
};

const consoleFormat = winston.format.printf(({ timestamp, level, message, ...meta }) => {
  const source = typeof meta.source === 'string' ? ` [${meta.source}]` : '';
  const rest = { ...meta };
  delete rest.source;
  const details = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  return `${timestamp} ${level}${source}: ${message}${details}`;
});

/**
 * Shared harvest logger. JSON lines when LOG_FORMAT=json (batch/cron use),
 * colorized single lines otherwise. Silent under the test runner.
 */
export const logger = winston.createLogger({
  level: resolveLevel(),
  silent: process.env.NODE_ENV === 'test',
  format:
    (process.env[FORMAT_KEY] || '').trim().toLowerCase() === 'json'
      ? winston.format.combine(winston.format.timestamp(), winston.format.json())
      : winston.format.combine(
          winston.format.colorize(),
          winston.format.timestamp(),
          consoleFormat,
        ),
  transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn'] })],
});

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};
