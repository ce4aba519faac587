#!/usr/bin/env node
import { runCli } from './cli';
import { logger } from './utils/logger';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.fatal({ error }, 'Unexpected failure');
    process.exitCode = 1;
  }
);
