#!/usr/bin/env node
import { main } from './cli';
import { logger } from './core/logger';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.fatal({ error }, 'Unhandled error');
    process.exitCode = 1;
  });
