#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

import { describeError, logger } from '../utils/logger';
import { runCli } from './cli';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(`Unexpected failure: ${describeError(error)}`, { source: 'cli' });
    process.exitCode = 1;
  });
